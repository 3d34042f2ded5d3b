import { createLogger, type Logger } from "../core/logger";
import type { Graph, NodeId } from "../ir/graph";
import { isSentinelKind, RETURN_KIND } from "../ir/kinds";
import { DegreeMapDesyncError } from "./scheduler-errors";

/**
 * Unsatisfied-dependency counts for every schedulable node.
 *
 * A node is handed out as ready exactly once: when its count reaches zero.
 */
export class DegreeMap {
  private degrees = new Map<NodeId, number>();

  set(node: NodeId, degree: number): void {
    this.degrees.set(node, degree);
  }

  get(node: NodeId): number | undefined {
    return this.degrees.get(node);
  }

  has(node: NodeId): boolean {
    return this.degrees.has(node);
  }

  total(): number {
    let sum = 0;
    for (const degree of this.degrees.values()) {
      sum += degree;
    }
    return sum;
  }

  /**
   * Tracked nodes of degree zero, in graph order.
   */
  readyNodes(graph: Graph): NodeId[] {
    return graph
      .nodes()
      .filter((node) => this.degrees.get(node.id) === 0)
      .map((node) => node.id);
  }

  /**
   * Tracked nodes whose dependencies are still not all satisfied.
   */
  pending(): NodeId[] {
    const out: NodeId[] = [];
    for (const [node, degree] of this.degrees) {
      if (degree > 0) out.push(node);
    }
    return out;
  }

  decrement(node: NodeId): number {
    const degree = this.degrees.get(node);
    if (degree === undefined) {
      throw new DegreeMapDesyncError(node, "consumer is not tracked");
    }
    if (degree === 0) {
      throw new DegreeMapDesyncError(node, "degree would drop below zero");
    }
    this.degrees.set(node, degree - 1);
    return degree - 1;
  }

  /**
   * Mark `producer` as scheduled: every consumer of its outputs loses one
   * dependency per edge. Returns the consumers that became ready, in
   * discovery order. Uses by the return sentinel are skipped.
   */
  release(graph: Graph, producer: NodeId): NodeId[] {
    const ready: NodeId[] = [];
    for (const valueId of graph.node(producer).outputs) {
      for (const use of graph.value(valueId).uses) {
        if (graph.node(use.user).kind === RETURN_KIND) {
          continue;
        }
        if (this.decrement(use.user) === 0) {
          ready.push(use.user);
        }
      }
    }
    return ready;
  }
}

/**
 * Count, for every non-sentinel node, the inputs that have a producer.
 * Inputs bound to a value with no producer are warned about and excluded.
 */
export function buildDegreeMap(
  graph: Graph,
  logger: Logger = createLogger("readiness"),
): DegreeMap {
  const dmap = new DegreeMap();
  for (const node of graph.nodes()) {
    if (isSentinelKind(node.kind)) {
      continue;
    }
    let degree = node.inputs.length;
    for (const valueId of node.inputs) {
      const value = graph.value(valueId);
      if (value.producer === null) {
        logger.warn(
          `${node.kind} %n${node.id} uses value %${value.name}, which is not bound to a node`,
        );
        degree -= 1;
      }
    }
    dmap.set(node.id, degree);
  }
  return dmap;
}
