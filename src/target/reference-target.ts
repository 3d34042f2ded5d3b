import { LOAD_KIND, STORE_KIND } from "../ir/kinds";
import { createResource, type TargetBackend } from "./cost-model";
import { TableCostModel } from "./table-cost-model";

export const REFERENCE_TARGET_NAME = "reference-dla";

/**
 * A small accelerator: one convolution core, one matrix unit, two
 * elementwise lanes, one pooling unit and two DMA channels. Boundary
 * Load/Store nodes run on DMA.
 */
export function createReferenceTarget(): TargetBackend {
  const conv = createResource("conv", 1);
  const matrix = createResource("matrix", 1);
  const elementwise = createResource("elementwise", 2);
  const pool = createResource("pool", 1);
  const dma = createResource("dma", 2);

  const costModel = new TableCostModel({
    kinds: {
      [LOAD_KIND]: { resource: dma, cycles: 4 },
      [STORE_KIND]: { resource: dma, cycles: 4 },
      Conv: { resource: conv, cycles: 24 },
      Gemm: { resource: matrix, cycles: 16 },
      MatMul: { resource: matrix, cycles: 16 },
      Relu: { resource: elementwise, cycles: 2 },
      Sigmoid: { resource: elementwise, cycles: 3 },
      Add: { resource: elementwise, cycles: 2 },
      Mul: { resource: elementwise, cycles: 2 },
      BatchNormalization: { resource: elementwise, cycles: 6 },
      LRN: { resource: elementwise, cycles: 8 },
      MaxPool: { resource: pool, cycles: 6 },
      AveragePool: { resource: pool, cycles: 6 },
      Softmax: { resource: elementwise, cycles: 10 },
    },
    fallback: { resource: elementwise, cycles: 4 },
  });

  return {
    name: REFERENCE_TARGET_NAME,
    resources: [conv, matrix, elementwise, pool, dma],
    costModel,
  };
}
