import type { Shape } from "../ports/native-type"
import type { TensorShape, WireTensor } from "../ports/wire-tensor"
import { TensorError } from "./tensor-error"

/** Product of the dimensions; a scalar (`[]`) holds one element. */
export function elementCount(shape: Shape): number {
  let count = 1
  for (const size of shape) count *= size
  return count
}

export function isValidShape(shape: Shape): boolean {
  return shape.every((size) => Number.isSafeInteger(size) && size >= 0)
}

/** Declared dimensions of a wire tensor, in order. */
export function dimsOf(tensor: WireTensor): number[] {
  const dims = tensor.tensorShape.dim.map((d) => d.size)
  if (!isValidShape(dims)) throw TensorError.invalidDimensions(dims)
  return dims
}

export function toTensorShape(shape: Shape): TensorShape {
  return { dim: shape.map((size) => ({ size })) }
}
