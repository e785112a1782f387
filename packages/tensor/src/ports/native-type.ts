/**
 * Storage backing each native element type. Half precision has no typed
 * array on Node 20 and is held widened to float32; complex values are
 * interleaved `[re, im]` pairs.
 */
export interface NativeDataMap {
  float16: Float32Array
  float32: Float32Array
  float64: Float64Array
  int8: Int8Array
  int16: Int16Array
  int32: Int32Array
  int64: BigInt64Array
  uint8: Uint8Array
  uint16: Uint16Array
  uint32: Uint32Array
  uint64: BigUint64Array
  bool: Uint8Array
  complex64: Float32Array
  complex128: Float64Array
  /** Variable-length byte strings. */
  bytes: Uint8Array[]
  /** Fixed-length byte strings, as produced by inference from `Uint8Array` leaves. */
  fixed_bytes: Uint8Array[]
  /** Text. Maps to the byte-string wire type but is never encodable. */
  str: string[]
}

export type Complex = readonly [re: number, im: number]

/** Value of a single element, as read from or written to storage. */
export interface NativeElementMap {
  float16: number
  float32: number
  float64: number
  int8: number
  int16: number
  int32: number
  int64: bigint
  uint8: number
  uint16: number
  uint32: number
  uint64: bigint
  bool: boolean
  complex64: Complex
  complex128: Complex
  bytes: Uint8Array
  fixed_bytes: Uint8Array
  str: string
}

export type NativeType = keyof NativeDataMap

export type Shape = readonly number[]

/**
 * A shaped, typed array in row-major order.
 *
 * `NDArray` on its own is the union over every native type, so checking
 * `dtype` narrows `data`:
 *
 * @example
 * ```ts
 * const array = decode(tensor)
 * if (array.dtype === "int64") {
 *   array.data // BigInt64Array
 * }
 * ```
 */
export type NDArray<K extends NativeType = NativeType> = {
  [P in K]: {
    readonly dtype: P
    readonly shape: Shape
    readonly data: NativeDataMap[P]
  }
}[K]

/** A leaf accepted by the encoder. */
export type Scalar = number | bigint | boolean | Uint8Array | string

export type NestedValues = Scalar | readonly NestedValues[]
