import { createLogger, type Logger } from "../core/logger";
import type { Graph, NodeId, Use } from "../ir/graph";
import { LOAD_KIND, STORE_KIND } from "../ir/kinds";

export type BoundaryResult = {
  skipped: boolean;
  loads: NodeId[];
  stores: NodeId[];
};

/**
 * True when Load/Store boundary nodes are already present: either the graph
 * carries the normalized flag or its last node is a Store marker.
 */
export function hasBoundaryNodes(graph: Graph): boolean {
  return graph.boundaryNormalized || graph.lastNode()?.kind === STORE_KIND;
}

function earliestUser(graph: Graph, uses: Use[]): NodeId | undefined {
  let first: NodeId | undefined;
  for (const use of uses) {
    if (first === undefined || graph.isBefore(use.user, first)) {
      first = use.user;
    }
  }
  return first;
}

function latestUser(graph: Graph, uses: Use[]): NodeId | undefined {
  let last: NodeId | undefined;
  for (const use of uses) {
    if (last === undefined || graph.isBefore(last, use.user)) {
      last = use.user;
    }
  }
  return last;
}

/**
 * Wrap external inputs in Load nodes and external outputs in Store nodes.
 *
 * A Load is inserted right before the input's earliest consumer and takes
 * over all of its uses. A Store consumes the output and is inserted right
 * before its latest consumer, which is the return sentinel unless something
 * else reads the value later. Values without consumers are left alone.
 */
export function normalizeBoundary(
  graph: Graph,
  logger: Logger = createLogger("boundary"),
): BoundaryResult {
  if (hasBoundaryNodes(graph)) {
    return { skipped: true, loads: [], stores: [] };
  }

  const loads: NodeId[] = [];
  const stores: NodeId[] = [];

  for (const input of graph.inputs()) {
    const first = earliestUser(graph, input.uses);
    if (first === undefined) {
      logger.warn(`graph input %${input.name} has no consumers; no Load inserted`);
      continue;
    }
    const load = graph.insertNodeBefore(first, LOAD_KIND, []);
    const loaded = graph.output(load);
    graph.copyMetadata(input.id, loaded.id);
    graph.replaceAllUsesWith(input.id, loaded.id);
    loads.push(load);
  }

  for (const output of graph.outputs()) {
    const last = latestUser(graph, output.uses);
    if (last === undefined) {
      logger.warn(`graph output %${output.name} has no consumers; no Store inserted`);
      continue;
    }
    const store = graph.insertNodeBefore(last, STORE_KIND, [output.id]);
    graph.copyMetadata(output.id, graph.output(store).id);
    stores.push(store);
  }

  graph.boundaryNormalized = true;
  return { skipped: false, loads, stores };
}
