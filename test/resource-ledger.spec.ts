import { describe, expect, it } from "vitest";

import { ResourceLedger } from "../src/engine/resource-ledger";
import { EmptyLedgerError, InvalidOperatorCostError } from "../src/engine/scheduler-errors";
import { Graph } from "../src/ir/graph";
import { createResource } from "../src/target/cost-model";
import { TableCostModel } from "../src/target/table-cost-model";

const R = createResource("R", 2);
const S = createResource("S", 1);
const Z = createResource("Z", 0);

function setup(costs: Record<string, number>) {
  const graph = new Graph();
  const ids: Record<string, number> = {};
  for (const kind of Object.keys(costs)) {
    ids[kind] = graph.appendNode(kind, []);
  }
  const kinds: Record<string, { resource: typeof R; cycles: number }> = {};
  for (const [kind, cycles] of Object.entries(costs)) {
    kinds[kind] = { resource: R, cycles };
  }
  const ledger = new ResourceLedger(new TableCostModel({ kinds }));
  return { graph, ids, ledger };
}

describe("ResourceLedger", () => {
  it("reports availability against capacity", () => {
    const { graph, ids, ledger } = setup({ A: 1, B: 1, C: 1 });
    expect(ledger.isAvailable(R)).toBe(true);
    ledger.addUser(R, graph.node(ids.A));
    expect(ledger.isAvailable(R)).toBe(true);
    ledger.addUser(R, graph.node(ids.B));
    expect(ledger.isAvailable(R)).toBe(false);
    expect(ledger.activeUsers(R).map((user) => user.node)).toEqual([ids.A, ids.B]);
  });

  it("treats zero capacity as always unavailable", () => {
    const { ledger } = setup({});
    expect(ledger.isAvailable(Z)).toBe(false);
    expect(ledger.resources()).toEqual([Z]);
    expect(ledger.activeCount()).toBe(0);
  });

  it("charges the cost model's cycle count", () => {
    const { graph, ids, ledger } = setup({ A: 7 });
    expect(ledger.addUser(R, graph.node(ids.A))).toEqual({ node: ids.A, remainingCycles: 7 });
  });

  it("rejects negative and fractional costs", () => {
    const { graph, ids, ledger } = setup({ A: -1, B: 1.5 });
    expect(() => ledger.addUser(R, graph.node(ids.A))).toThrow(InvalidOperatorCostError);
    expect(() => ledger.addUser(R, graph.node(ids.B))).toThrow(InvalidOperatorCostError);
    expect(ledger.activeCount()).toBe(0);
  });

  it("refuses to advance with no active users", () => {
    const { ledger } = setup({});
    expect(() => ledger.advance()).toThrow(EmptyLedgerError);
    ledger.ensureEntry(R);
    expect(() => ledger.advance()).toThrow(EmptyLedgerError);
  });

  it("advances to the soonest release across resources", () => {
    const { graph, ids, ledger } = setup({ A: 3, B: 5, C: 3 });
    ledger.addUser(R, graph.node(ids.A));
    ledger.addUser(R, graph.node(ids.B));
    ledger.addUser(S, graph.node(ids.C));

    expect(ledger.advance()).toEqual({ minCycles: 3, released: [ids.A, ids.C] });
    expect(ledger.activeUsers(R)).toEqual([{ node: ids.B, remainingCycles: 2 }]);
    expect(ledger.activeUsers(S)).toEqual([]);
    expect(ledger.advance()).toEqual({ minCycles: 2, released: [ids.B] });
    expect(ledger.activeCount()).toBe(0);
  });

  it("keeps unreleased users in place when releasing around them", () => {
    const wide = createResource("wide", 3);
    const { graph, ids, ledger } = setup({ A: 2, B: 5, C: 2 });
    ledger.addUser(wide, graph.node(ids.A));
    ledger.addUser(wide, graph.node(ids.B));
    ledger.addUser(wide, graph.node(ids.C));

    expect(ledger.advance().released).toEqual([ids.A, ids.C]);
    expect(ledger.activeUsers(wide)).toEqual([{ node: ids.B, remainingCycles: 3 }]);
  });

  it("releases zero-cycle users on the next advance", () => {
    const { graph, ids, ledger } = setup({ A: 0, B: 4 });
    ledger.addUser(R, graph.node(ids.A));
    ledger.addUser(R, graph.node(ids.B));
    expect(ledger.advance()).toEqual({ minCycles: 0, released: [ids.A] });
    expect(ledger.activeUsers(R)).toEqual([{ node: ids.B, remainingCycles: 4 }]);
  });
});
