import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { normalizeBoundary } from "../src/engine/boundary";
import { scheduleGraph } from "../src/engine/list-scheduler";
import { buildDegreeMap } from "../src/engine/readiness";
import { activeAt, type ScheduleEntry } from "../src/engine/schedule";
import { Graph, type ValueId } from "../src/ir/graph";
import { isSentinelKind, STORE_KIND } from "../src/ir/kinds";
import { createResource, type ExecutionResource } from "../src/target/cost-model";
import { attrCostModel, recordingLogger } from "./helpers/graphs";

type NodeSpec = {
  inputs: number[];
  resource: number;
  cycles: number;
  dangling: boolean;
  readsInput: boolean;
};

type GraphSpec = {
  capacities: [number, number, number];
  nodes: NodeSpec[];
};

const nodeSpecArb: fc.Arbitrary<NodeSpec> = fc.record({
  inputs: fc.array(fc.nat({ max: 20 }), { maxLength: 3 }),
  resource: fc.integer({ min: 0, max: 2 }),
  cycles: fc.integer({ min: 0, max: 5 }),
  dangling: fc.boolean(),
  readsInput: fc.boolean(),
});

const graphSpecArb: fc.Arbitrary<GraphSpec> = fc.record({
  capacities: fc.tuple(
    fc.integer({ min: 1, max: 3 }),
    fc.integer({ min: 1, max: 3 }),
    fc.integer({ min: 1, max: 3 }),
  ),
  nodes: fc.array(nodeSpecArb, { minLength: 1, maxLength: 12 }),
});

/**
 * Acyclic by construction: node i only reads outputs of nodes before it.
 */
function buildGraph(spec: GraphSpec): { graph: Graph; resources: ExecutionResource[] } {
  const resources = spec.capacities.map((units, i) => createResource(`r${i}`, units));
  const graph = new Graph();
  const x = graph.addInput({ shape: [4], dtype: "f32" });
  const outputs: ValueId[] = [];
  spec.nodes.forEach((node, i) => {
    const inputs: ValueId[] = i > 0 ? node.inputs.map((j) => outputs[j % i]) : [];
    if (node.dangling) inputs.push(graph.addUnboundValue());
    if (node.readsInput) inputs.push(x);
    const id = graph.appendNode(`op${i}`, inputs, {
      attrs: { resource: node.resource, cycles: node.cycles },
    });
    outputs.push(graph.output(id).id);
  });
  graph.markOutput(outputs[outputs.length - 1]);
  return { graph, resources };
}

function entriesByNode(entries: ScheduleEntry[]): Map<number, ScheduleEntry> {
  return new Map(entries.map((entry) => [entry.node, entry]));
}

describe("property tests: list scheduling", () => {
  it("admits every node exactly once, after all of its producers", () => {
    fc.assert(
      fc.property(graphSpecArb, (spec) => {
        const { graph, resources } = buildGraph(spec);
        const schedule = scheduleGraph(graph, attrCostModel(resources), {
          logger: recordingLogger(),
        });
        const byNode = entriesByNode(schedule.entries);

        expect(schedule.stalled).toEqual([]);
        expect(schedule.unscheduled).toEqual([]);
        expect(schedule.order).toHaveLength(graph.size);
        expect(byNode.size).toBe(graph.size);

        for (const entry of schedule.entries) {
          for (const valueId of graph.node(entry.node).inputs) {
            const producer = graph.value(valueId).producer;
            if (producer === null) continue;
            const before = byNode.get(producer);
            expect(before).toBeDefined();
            expect(before && before.round < entry.round).toBe(true);
          }
        }
      }),
      { numRuns: 100 },
    );
  });

  it("never exceeds a resource's unit count", () => {
    fc.assert(
      fc.property(graphSpecArb, (spec) => {
        const { graph, resources } = buildGraph(spec);
        const schedule = scheduleGraph(graph, attrCostModel(resources), {
          logger: recordingLogger(),
        });
        const capacity = new Map(resources.map((resource) => [resource.name, resource.numUnits]));

        for (const entry of schedule.entries) {
          const busy = activeAt(schedule.entries, entry.resource, entry.startCycle);
          expect(busy.length).toBeLessThanOrEqual(capacity.get(entry.resource) ?? 0);
        }
      }),
      { numRuns: 100 },
    );
  });

  it("finishes within one round per node", () => {
    fc.assert(
      fc.property(graphSpecArb, (spec) => {
        const { graph, resources } = buildGraph(spec);
        const schedule = scheduleGraph(graph, attrCostModel(resources), {
          logger: recordingLogger(),
        });
        expect(schedule.rounds.length).toBeLessThanOrEqual(graph.size);
      }),
      { numRuns: 100 },
    );
  });

  it("counts exactly the produced, non-sentinel edges", () => {
    fc.assert(
      fc.property(graphSpecArb, (spec) => {
        const { graph } = buildGraph(spec);
        let edges = 0;
        for (const node of graph.nodes()) {
          if (isSentinelKind(node.kind)) continue;
          for (const valueId of node.inputs) {
            if (graph.value(valueId).producer !== null) edges += 1;
          }
        }
        expect(buildDegreeMap(graph, recordingLogger()).total()).toBe(edges);
      }),
      { numRuns: 100 },
    );
  });

  it("normalizes the boundary once", () => {
    fc.assert(
      fc.property(graphSpecArb, (spec) => {
        const { graph } = buildGraph(spec);
        normalizeBoundary(graph, recordingLogger());
        const once = graph.nodes().map((node) => node.id);
        normalizeBoundary(graph, recordingLogger());

        expect(graph.nodes().map((node) => node.id)).toEqual(once);
        for (const input of graph.inputs()) {
          expect(input.uses).toEqual([]);
        }
        for (const output of graph.outputs()) {
          const stores = output.uses.filter((use) => graph.node(use.user).kind === STORE_KIND);
          expect(stores).toHaveLength(1);
        }
      }),
      { numRuns: 100 },
    );
  });
});
