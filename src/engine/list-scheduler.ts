import { createLogger, type Logger } from "../core/logger";
import type { Graph, NodeId } from "../ir/graph";
import type { CostModel } from "../target/cost-model";
import { type BoundaryResult, normalizeBoundary } from "./boundary";
import { buildDegreeMap } from "./readiness";
import { ResourceLedger } from "./resource-ledger";
import { formatSchedule, type Schedule, type ScheduleEntry, type ScheduleRound } from "./schedule";
import { MissingCostModelError } from "./scheduler-errors";

export type SchedulerState =
  | "normalizing"
  | "ready-scan"
  | "greedy-admit"
  | "time-advance"
  | "propagate"
  | "done";

export type ListSchedulerOptions = {
  logger?: Logger;
  /** Insert Load/Store boundary nodes first. Default: true. */
  normalize?: boolean;
  /** Called on every state transition. */
  trace?: (state: SchedulerState, round: number) => void;
};

export interface Admission {
  node: NodeId;
  resource: string;
  cycles: number;
}

/**
 * One left-to-right pass over the candidates. Every candidate whose resource
 * has a free unit is admitted and removed from `candidates`; the rest stay
 * queued in their original order. No look-ahead, no reordering.
 */
export function greedyPickNextNodes(
  graph: Graph,
  candidates: NodeId[],
  ledger: ResourceLedger,
  costModel: CostModel,
): Admission[] {
  const admitted: Admission[] = [];
  const kept: NodeId[] = [];
  for (const id of candidates) {
    const node = graph.node(id);
    const resource = costModel.queryExeResType(node);
    if (ledger.isAvailable(resource)) {
      const user = ledger.addUser(resource, node);
      admitted.push({ node: id, resource: resource.name, cycles: user.remainingCycles });
    } else {
      kept.push(id);
    }
  }
  candidates.splice(0, candidates.length, ...kept);
  return admitted;
}

const SKIPPED_BOUNDARY: BoundaryResult = { skipped: true, loads: [], stores: [] };

/**
 * Resource-constrained list scheduling over the graph's current order.
 *
 * Each round admits what fits, advances simulated time to the next release,
 * then makes the admitted nodes' consumers ready. Runs until no ready node
 * is left. The graph is only mutated by boundary normalization.
 */
export function scheduleGraph(
  graph: Graph,
  costModel: CostModel | undefined,
  options: ListSchedulerOptions = {},
): Schedule {
  if (!costModel) {
    throw new MissingCostModelError();
  }
  const logger = options.logger ?? createLogger("scheduler");
  const trace = options.trace ?? (() => {});

  trace("normalizing", 0);
  const boundary =
    options.normalize === false ? SKIPPED_BOUNDARY : normalizeBoundary(graph, logger);

  trace("ready-scan", 0);
  const dmap = buildDegreeMap(graph, logger);
  const worklist = dmap.readyNodes(graph);
  const ledger = new ResourceLedger(costModel);

  const rounds: ScheduleRound[] = [];
  const entries: ScheduleEntry[] = [];
  let stalled: NodeId[] = [];
  let now = 0;

  while (worklist.length > 0) {
    const index = rounds.length;
    trace("greedy-admit", index);
    const admitted = greedyPickNextNodes(graph, worklist, ledger, costModel);
    if (admitted.length === 0 && ledger.activeCount() === 0) {
      // Nothing running and nothing fits: every candidate needs a
      // zero-capacity resource.
      stalled = worklist.splice(0);
      logger.warn(
        `${stalled.length} ready node(s) can never be admitted: ` +
          stalled.map((id) => `${graph.node(id).kind} %n${id}`).join(", "),
      );
      break;
    }
    for (const admission of admitted) {
      entries.push({
        node: admission.node,
        kind: graph.node(admission.node).kind,
        resource: admission.resource,
        admissionIndex: entries.length,
        round: index,
        startCycle: now,
        endCycle: now + admission.cycles,
        cycles: admission.cycles,
      });
    }

    trace("time-advance", index);
    const { minCycles, released } = ledger.advance();
    rounds.push({
      index,
      startCycle: now,
      admitted: admitted.map((admission) => admission.node),
      elapsedCycles: minCycles,
      released,
    });
    now += minCycles;

    trace("propagate", index);
    for (const admission of admitted) {
      worklist.push(...dmap.release(graph, admission.node));
    }
  }
  trace("done", rounds.length);

  const unscheduled = dmap
    .pending()
    .sort((a, b) => graph.node(a).order - graph.node(b).order);
  if (unscheduled.length > 0) {
    logger.warn(`${unscheduled.length} node(s) never became ready`);
  }

  const schedule: Schedule = {
    rounds,
    entries,
    order: entries.map((entry) => entry.node),
    makespan: entries.reduce((max, entry) => Math.max(max, entry.endCycle), 0),
    unscheduled,
    stalled,
    boundary,
  };
  logger.debug(`\n${formatSchedule(schedule)}`);
  return schedule;
}
