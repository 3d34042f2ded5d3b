import { resolveSchedulerConfig, type SchedulerConfig } from "../config";
import type { Logger } from "../core/logger";
import type { Graph, NodeId } from "../ir/graph";
import { UNDEFINED_KIND } from "../ir/kinds";
import type { TargetBackend } from "../target/cost-model";
import { GRAPH_OUTPUT_SIZE_PASS_ID } from "./graph-output-size";
import { scheduleGraph } from "./list-scheduler";
import type { CompileModule, Pass, PassContext, PassResult } from "./pass";
import type { Schedule } from "./schedule";

export const NODE_SCHEDULER_PASS_ID = "node-scheduler";

/**
 * Graph order that follows a schedule: undefined placeholders first, then
 * admitted nodes in admission order, then everything never admitted in its
 * current relative order.
 */
export function emittedOrder(graph: Graph, schedule: Schedule): NodeId[] {
  const admitted = new Set(schedule.order);
  const placeholders: NodeId[] = [];
  const leftover: NodeId[] = [];
  for (const node of graph.nodes()) {
    if (admitted.has(node.id)) continue;
    if (node.kind === UNDEFINED_KIND) {
      placeholders.push(node.id);
    } else {
      leftover.push(node.id);
    }
  }
  return [...placeholders, ...schedule.order, ...leftover];
}

/**
 * Module-level scheduling pass. Needs a target with a cost model; without
 * one it fails before touching the graph.
 */
export class NodeSchedulerPass implements Pass {
  readonly id = NODE_SCHEDULER_PASS_ID;
  readonly requires = [GRAPH_OUTPUT_SIZE_PASS_ID];
  lastSchedule: Schedule | undefined;
  private readonly config: SchedulerConfig;
  /** Set when the caller asked for a logger or a level; otherwise the pipeline's logger is used. */
  private readonly logger: Logger | undefined;

  constructor(
    private readonly target: TargetBackend | undefined,
    config: Partial<SchedulerConfig> = {},
  ) {
    this.config = resolveSchedulerConfig(config);
    this.logger =
      config.logger !== undefined || config.logLevel !== undefined ? this.config.logger : undefined;
  }

  run(module: CompileModule, context: PassContext): PassResult {
    const logger = this.logger ?? context.logger;
    this.lastSchedule = undefined;
    const costModel = this.target?.costModel;
    if (!costModel) {
      logger.error(
        `No backend information for scheduling ${module.name}` +
          (this.target ? ` (target ${this.target.name} has no cost model)` : ""),
      );
      return "failure";
    }

    const schedule = scheduleGraph(module.graph, costModel, {
      logger,
      normalize: this.config.normalize,
    });
    this.lastSchedule = schedule;

    let changed = schedule.boundary.loads.length + schedule.boundary.stores.length > 0;
    if (this.config.reorderGraph) {
      changed = module.graph.reorder(emittedOrder(module.graph, schedule)) || changed;
    }
    return changed ? "changed" : "no_change";
  }
}
