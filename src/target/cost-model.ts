import type { IRNode } from "../ir/graph";

/**
 * A class of accelerator functional unit. At most `numUnits` operators of
 * this class execute at once. Resources are compared by identity.
 */
export interface ExecutionResource {
  readonly name: string;
  readonly numUnits: number;
}

export type CostMetric = "cycleCount";

/**
 * Per-target oracle consulted by the scheduler. It decides which resource
 * class runs an operator and how long it occupies one unit.
 */
export interface CostModel {
  getOperatorCost(node: IRNode, metric?: CostMetric): number;
  queryExeResType(node: IRNode): ExecutionResource;
}

export interface TargetBackend {
  name: string;
  resources: ExecutionResource[];
  /** Absent when the target has no scheduling information. */
  costModel?: CostModel;
}

export function createResource(name: string, numUnits: number): ExecutionResource {
  const unlimited = numUnits === Number.POSITIVE_INFINITY;
  if (!unlimited && (!Number.isInteger(numUnits) || numUnits < 0)) {
    throw new Error(
      `Resource ${name} needs a non-negative integer or unlimited unit count, got ${numUnits}`,
    );
  }
  return Object.freeze({ name, numUnits });
}
