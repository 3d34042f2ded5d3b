import { describe, expect, it } from "vitest";

import { Graph } from "../src/ir/graph";
import { LOAD_KIND, STORE_KIND } from "../src/ir/kinds";
import { createResource } from "../src/target/cost-model";
import { createReferenceTarget, REFERENCE_TARGET_NAME } from "../src/target/reference-target";
import { TargetRegistry } from "../src/target/registry";
import { TableCostModel, UnknownOperatorError } from "../src/target/table-cost-model";

describe("createResource", () => {
  it("freezes the resource", () => {
    const resource = createResource("dma", 2);
    expect(resource).toEqual({ name: "dma", numUnits: 2 });
    expect(Object.isFrozen(resource)).toBe(true);
  });

  it("allows zero units but not negative or fractional counts", () => {
    expect(createResource("off", 0).numUnits).toBe(0);
    expect(() => createResource("bad", -1)).toThrow("non-negative integer");
    expect(() => createResource("bad", 1.5)).toThrow("non-negative integer");
    expect(() => createResource("bad", Number.NaN)).toThrow("non-negative integer");
  });

  it("accepts an unlimited unit count", () => {
    expect(createResource("shared", Number.POSITIVE_INFINITY).numUnits).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("TableCostModel", () => {
  const conv = createResource("conv", 1);
  const misc = createResource("misc", 4);

  it("looks up resource and cycles by kind", () => {
    const graph = new Graph();
    const node = graph.node(graph.appendNode("Conv", []));
    const model = new TableCostModel({ kinds: { Conv: { resource: conv, cycles: 12 } } });

    expect(model.queryExeResType(node)).toBe(conv);
    expect(model.getOperatorCost(node)).toBe(12);
    expect(model.getOperatorCost(node, "cycleCount")).toBe(12);
  });

  it("uses the fallback for unlisted kinds", () => {
    const graph = new Graph();
    const node = graph.node(graph.appendNode("Gather", []));
    const model = new TableCostModel({ kinds: {}, fallback: { resource: misc, cycles: 3 } });

    expect(model.queryExeResType(node)).toBe(misc);
    expect(model.getOperatorCost(node)).toBe(3);
  });

  it("throws for unlisted kinds without a fallback", () => {
    const graph = new Graph();
    const node = graph.node(graph.appendNode("toString", []));
    const model = new TableCostModel({ kinds: {} });

    expect(() => model.queryExeResType(node)).toThrow(UnknownOperatorError);
  });
});

describe("TargetRegistry", () => {
  it("registers and resolves targets by name", () => {
    const reference = createReferenceTarget();
    const registry = new TargetRegistry([reference]);
    registry.register({ name: "bare", resources: [] });

    expect(registry.names()).toEqual([REFERENCE_TARGET_NAME, "bare"]);
    expect(registry.use(REFERENCE_TARGET_NAME)).toBe(reference);
    expect(registry.get("bare")?.costModel).toBeUndefined();
    expect(registry.get("missing")).toBeUndefined();
    expect(() => registry.use("missing")).toThrow("Unknown target: missing");
  });

  it("keeps registries independent", () => {
    const a = new TargetRegistry();
    const b = new TargetRegistry();
    a.register({ name: "only-a", resources: [] });
    expect(b.names()).toEqual([]);
  });
});

describe("reference target", () => {
  it("runs boundary nodes on DMA", () => {
    const target = createReferenceTarget();
    const graph = new Graph();
    const load = graph.node(graph.appendNode(LOAD_KIND, []));
    const store = graph.node(graph.appendNode(STORE_KIND, [graph.output(load.id).id]));
    const dma = target.resources.find((resource) => resource.name === "dma");

    expect(dma?.numUnits).toBe(2);
    expect(target.costModel?.queryExeResType(load)).toBe(dma);
    expect(target.costModel?.queryExeResType(store)).toBe(dma);
    expect(target.costModel?.getOperatorCost(load)).toBe(4);
  });
});
