import type { IRNode } from "../ir/graph";
import type { NodeKind } from "../ir/kinds";
import type { CostMetric, CostModel, ExecutionResource } from "./cost-model";

export type CostEntry = {
  resource: ExecutionResource;
  cycles: number;
};

export type CostTable = {
  kinds: Record<NodeKind, CostEntry>;
  /** Used for kinds missing from `kinds`. */
  fallback?: CostEntry;
};

export class UnknownOperatorError extends Error {
  constructor(public readonly kind: NodeKind) {
    super(`No cost entry for operator kind ${kind}`);
    this.name = "UnknownOperatorError";
  }
}

/**
 * Cost model backed by a per-kind lookup table.
 */
export class TableCostModel implements CostModel {
  private readonly table: CostTable;

  constructor(table: CostTable) {
    this.table = {
      kinds: { ...table.kinds },
      fallback: table.fallback,
    };
  }

  getOperatorCost(node: IRNode, _metric: CostMetric = "cycleCount"): number {
    return this.entryFor(node).cycles;
  }

  queryExeResType(node: IRNode): ExecutionResource {
    return this.entryFor(node).resource;
  }

  private entryFor(node: IRNode): CostEntry {
    const entry = Object.prototype.hasOwnProperty.call(this.table.kinds, node.kind)
      ? this.table.kinds[node.kind]
      : this.table.fallback;
    if (!entry) {
      throw new UnknownOperatorError(node.kind);
    }
    return entry;
  }
}
