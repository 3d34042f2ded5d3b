import type { IRNode, NodeId } from "../ir/graph";
import type { CostModel, ExecutionResource } from "../target/cost-model";
import { EmptyLedgerError, InvalidOperatorCostError } from "./scheduler-errors";

/**
 * One node holding one unit of a resource.
 */
export interface ResourceUser {
  node: NodeId;
  remainingCycles: number;
}

export type AdvanceResult = {
  minCycles: number;
  released: NodeId[];
};

/**
 * Occupancy of every execution resource seen so far in a scheduling run.
 */
export class ResourceLedger {
  private users = new Map<ExecutionResource, ResourceUser[]>();

  constructor(private readonly costModel: CostModel) {}

  /**
   * Create an empty entry for a resource on first reference.
   */
  ensureEntry(resource: ExecutionResource): ResourceUser[] {
    let list = this.users.get(resource);
    if (!list) {
      list = [];
      this.users.set(resource, list);
    }
    return list;
  }

  isAvailable(resource: ExecutionResource): boolean {
    return this.ensureEntry(resource).length < resource.numUnits;
  }

  /**
   * Occupy one unit of `resource` for as many cycles as the cost model
   * charges for `node`. Capacity is the caller's check (see isAvailable).
   */
  addUser(resource: ExecutionResource, node: IRNode): ResourceUser {
    const cycles = this.costModel.getOperatorCost(node, "cycleCount");
    if (!Number.isInteger(cycles) || cycles < 0) {
      throw new InvalidOperatorCostError(node.id, cycles);
    }
    const user: ResourceUser = { node: node.id, remainingCycles: cycles };
    this.ensureEntry(resource).push(user);
    return user;
  }

  activeUsers(resource: ExecutionResource): readonly ResourceUser[] {
    return this.users.get(resource) ?? [];
  }

  activeCount(): number {
    let count = 0;
    for (const list of this.users.values()) {
      count += list.length;
    }
    return count;
  }

  resources(): ExecutionResource[] {
    return [...this.users.keys()];
  }

  /**
   * Move simulated time forward to the next release event.
   *
   * Subtracts the smallest remaining cycle count from every user and
   * releases those that reach zero. Requires at least one active user.
   */
  advance(): AdvanceResult {
    let minCycles = Number.POSITIVE_INFINITY;
    for (const list of this.users.values()) {
      for (const user of list) {
        minCycles = Math.min(minCycles, user.remainingCycles);
      }
    }
    if (minCycles === Number.POSITIVE_INFINITY) {
      throw new EmptyLedgerError();
    }

    const released: NodeId[] = [];
    for (const list of this.users.values()) {
      const finished: number[] = [];
      for (let i = 0; i < list.length; i++) {
        list[i].remainingCycles -= minCycles;
        if (list[i].remainingCycles === 0) {
          finished.push(i);
        }
      }
      for (const index of finished) {
        released.push(list[index].node);
      }
      // Highest index first so pending indices stay valid.
      for (let i = finished.length - 1; i >= 0; i--) {
        list.splice(finished[i], 1);
      }
    }
    return { minCycles, released };
  }
}
