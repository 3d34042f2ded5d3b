/**
 * Canonical pure shape and dtype utility functions.
 *
 * No imports; any layer may use it.
 */

export type DType = "f16" | "f32" | "i32" | "i8" | "u8" | "bool";

export function sizeOf(shape: number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function bytesPerElement(dtype: DType): number {
  switch (dtype) {
    case "f32":
    case "i32":
      return 4;
    case "f16":
      return 2;
    default:
      return 1;
  }
}

/**
 * Compute buffer size in bytes for a tensor.
 */
export function computeBufferSize(shape: number[], dtype: DType): number {
  return sizeOf(shape) * bytesPerElement(dtype);
}

export function broadcastShapes(a: number[], b: number[]): number[] {
  const outRank = Math.max(a.length, b.length);
  const out = new Array<number>(outRank);
  for (let i = 0; i < outRank; i += 1) {
    const aDim = a[a.length - 1 - i] ?? 1;
    const bDim = b[b.length - 1 - i] ?? 1;
    if (aDim !== bDim && aDim !== 1 && bDim !== 1) {
      throw new Error(`Cannot broadcast shapes [${a}] and [${b}]`);
    }
    out[outRank - 1 - i] = Math.max(aDim, bDim);
  }
  return out;
}
