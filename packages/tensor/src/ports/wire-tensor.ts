import type { LogicalType } from "./logical-type"

export type TensorShapeDim = {
  readonly size: number
}

export type TensorShape = {
  readonly dim: readonly TensorShapeDim[]
}

/**
 * The external tensor message.
 *
 * The payload is either `tensorContent` (little-endian, row-major, fixed
 * width per element) or one of the typed value lists. Every integer width
 * shares `intVal`.
 */
export type WireTensor = {
  readonly dtype: LogicalType
  readonly tensorShape: TensorShape
  readonly tensorContent?: Uint8Array
  readonly floatVal?: readonly number[]
  readonly doubleVal?: readonly number[]
  readonly intVal?: readonly (number | bigint)[]
  readonly boolVal?: readonly boolean[]
  readonly stringVal?: readonly Uint8Array[]
}
