import { broadcastShapes, computeBufferSize, type DType } from "../core/shape";
import type { Graph, IRNode, IRValue, ValueId } from "../ir/graph";
import { LOAD_KIND, STORE_KIND } from "../ir/kinds";
import type { CompileModule, Pass, PassContext, PassResult } from "./pass";

export const GRAPH_OUTPUT_SIZE_PASS_ID = "graph-output-size";

/** Ops whose single output has the broadcast shape and shared dtype of their inputs. */
const ELEMENTWISE_KINDS = new Set([
  "Add",
  "Sub",
  "Mul",
  "Div",
  "Neg",
  "Abs",
  "Exp",
  "Log",
  "Relu",
  "Sigmoid",
  "Tanh",
  "Sqrt",
  "LRN",
  LOAD_KIND,
  STORE_KIND,
]);

export function isElementwise(kind: string): boolean {
  return ELEMENTWISE_KINDS.has(kind);
}

function inferShape(inputs: IRValue[]): number[] | undefined {
  let shape: number[] | undefined;
  for (const input of inputs) {
    if (!input.shape) {
      return undefined;
    }
    shape = shape ? broadcastShapes(shape, input.shape) : input.shape.slice();
  }
  return shape;
}

function inferDType(kind: string, inputs: IRValue[]): DType | undefined {
  const dtype = inputs[0]?.dtype;
  if (!dtype) {
    return undefined;
  }
  for (const input of inputs) {
    if (input.dtype !== dtype) {
      throw new Error(`graph output size: dtype mismatch for op ${kind}`);
    }
  }
  return dtype;
}

/**
 * Fill missing shape/dtype on elementwise outputs from their inputs.
 * Returns the number of values updated.
 */
export function propagateElementwiseMetadata(graph: Graph): number {
  let updated = 0;
  for (const node of graph.nodes()) {
    if (!isElementwise(node.kind) || node.inputs.length === 0) {
      continue;
    }
    updated += fillOutputs(graph, node);
  }
  return updated;
}

function fillOutputs(graph: Graph, node: IRNode): number {
  if (node.outputs.length !== 1) {
    return 0;
  }
  const out = graph.value(node.outputs[0]);
  const inputs = node.inputs.map((id) => graph.value(id));
  let updated = false;
  if (!out.shape) {
    out.shape = inferShape(inputs);
    updated = out.shape !== undefined;
  }
  if (!out.dtype) {
    out.dtype = inferDType(node.kind, inputs);
    updated = updated || out.dtype !== undefined;
  }
  return updated ? 1 : 0;
}

export type GraphOutputSizes = Map<ValueId, number | undefined>;

/**
 * Byte size of every graph output; undefined where shape or dtype is unknown.
 */
export function computeGraphOutputSizes(graph: Graph): GraphOutputSizes {
  const sizes: GraphOutputSizes = new Map();
  for (const output of graph.outputs()) {
    sizes.set(
      output.id,
      output.shape && output.dtype
        ? computeBufferSize(output.shape, output.dtype)
        : undefined,
    );
  }
  return sizes;
}

export class GraphOutputSizeAnalysis implements Pass {
  readonly id = GRAPH_OUTPUT_SIZE_PASS_ID;
  lastResult: GraphOutputSizes | undefined;

  run(module: CompileModule, context: PassContext): PassResult {
    const updated = propagateElementwiseMetadata(module.graph);
    const sizes = computeGraphOutputSizes(module.graph);
    for (const [valueId, size] of sizes) {
      if (size === undefined) {
        context.logger.warn(
          `output %${module.graph.value(valueId).name} of ${module.name} has unknown size`,
        );
      }
    }
    this.lastResult = sizes;
    return updated > 0 ? "changed" : "no_change";
  }
}
