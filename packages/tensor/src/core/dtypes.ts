import type {
  Complex,
  NativeDataMap,
  NativeElementMap,
  NativeType,
  Scalar,
} from "../ports/native-type"
import { f16BitsToF32, f32ToF16Bits } from "./half"

/** Little-endian fixed-width layout of one element in the raw-bytes form. */
export type RawLayout<E> = {
  readonly width: number
  read(view: DataView, offset: number): E
  write(view: DataView, offset: number, value: E): void
}

export type StorageTraits<S, E> = {
  /** Absent for byte strings, which only travel as a value list. */
  readonly raw?: RawLayout<E>
  alloc(count: number): S
  size(data: S): number
  get(data: S, index: number): E
  set(data: S, index: number, value: E): void
  /** Convert a user or wire scalar; `undefined` when it has no meaning here. */
  coerce(value: Scalar): E | undefined
}

export type DTypeTraits<K extends NativeType> = StorageTraits<NativeDataMap[K], NativeElementMap[K]>

type NumberStore = { [index: number]: number; readonly length: number }
type BigIntStore = { [index: number]: bigint; readonly length: number }

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n

function toNumber(value: Scalar): number | undefined {
  if (typeof value === "number") return value
  if (typeof value === "bigint") return Number(value)
  if (typeof value === "boolean") return value ? 1 : 0
  return undefined
}

function toBigInt(value: Scalar): bigint | undefined {
  if (typeof value === "bigint") return value
  if (typeof value === "boolean") return value ? 1n : 0n
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value)
  return undefined
}

/** Integers within `[min, max]`; fractions, NaN and anything out of range have no value. */
function inRange(min: bigint, max: bigint) {
  return (value: Scalar): bigint | undefined => {
    const n = toBigInt(value)
    return n !== undefined && n >= min && n <= max ? n : undefined
  }
}

function intRange(min: number, max: number) {
  return (value: Scalar): number | undefined => {
    const n = toNumber(value)
    return n !== undefined && Number.isInteger(n) && n >= min && n <= max ? n : undefined
  }
}

function toHalf(value: number): number {
  return f16BitsToF32(f32ToF16Bits(value))
}

function numeric<S extends NumberStore>(
  alloc: (count: number) => S,
  raw: RawLayout<number>,
  coerce: (value: Scalar) => number | undefined = toNumber,
  round?: (value: number) => number,
): StorageTraits<S, number> {
  return {
    raw,
    alloc,
    size: (data: NumberStore) => data.length,
    get: (data: NumberStore, index: number) => data[index] ?? 0,
    set: (data: NumberStore, index: number, value: number) => {
      data[index] = round ? round(value) : value
    },
    coerce,
  }
}

function wide<S extends BigIntStore>(
  alloc: (count: number) => S,
  raw: RawLayout<bigint>,
  coerce: (value: Scalar) => bigint | undefined,
): StorageTraits<S, bigint> {
  return {
    raw,
    alloc,
    size: (data: BigIntStore) => data.length,
    get: (data: BigIntStore, index: number) => data[index] ?? 0n,
    set: (data: BigIntStore, index: number, value: bigint) => {
      data[index] = value
    },
    coerce,
  }
}

function complex<S extends NumberStore>(
  alloc: (count: number) => S,
  partWidth: 4 | 8,
): StorageTraits<S, Complex> {
  const readPart = (view: DataView, offset: number) =>
    partWidth === 4 ? view.getFloat32(offset, true) : view.getFloat64(offset, true)
  const writePart = (view: DataView, offset: number, value: number) => {
    if (partWidth === 4) view.setFloat32(offset, value, true)
    else view.setFloat64(offset, value, true)
  }

  return {
    raw: {
      width: partWidth * 2,
      read: (view, offset) => [readPart(view, offset), readPart(view, offset + partWidth)],
      write: (view, offset, [re, im]) => {
        writePart(view, offset, re)
        writePart(view, offset + partWidth, im)
      },
    },
    alloc: (count) => alloc(count * 2),
    size: (data: NumberStore) => data.length / 2,
    get: (data: NumberStore, index: number) => [data[index * 2] ?? 0, data[index * 2 + 1] ?? 0],
    set: (data: NumberStore, index: number, [re, im]: Complex) => {
      data[index * 2] = re
      data[index * 2 + 1] = im
    },
    coerce: (value) => {
      const re = toNumber(value)
      return re === undefined ? undefined : [re, 0]
    },
  }
}

const byteStrings: StorageTraits<Uint8Array[], Uint8Array> = {
  alloc: (count) => Array.from({ length: count }, () => new Uint8Array(0)),
  size: (data) => data.length,
  get: (data, index) => data[index] ?? new Uint8Array(0),
  set: (data, index, value) => {
    data[index] = value
  },
  coerce: (value) => (value instanceof Uint8Array ? value.slice() : undefined),
}

const bool: StorageTraits<Uint8Array, boolean> = {
  raw: {
    width: 1,
    read: (view, offset) => view.getUint8(offset) !== 0,
    write: (view, offset, value) => view.setUint8(offset, value ? 1 : 0),
  },
  alloc: (count) => new Uint8Array(count),
  size: (data) => data.length,
  get: (data, index) => (data[index] ?? 0) !== 0,
  set: (data, index, value) => {
    data[index] = value ? 1 : 0
  },
  coerce: (value) => {
    if (typeof value === "boolean") return value
    if (typeof value === "number") return value !== 0
    if (typeof value === "bigint") return value !== 0n
    return undefined
  },
}

const text: StorageTraits<string[], string> = {
  alloc: (count) => Array.from({ length: count }, () => ""),
  size: (data) => data.length,
  get: (data, index) => data[index] ?? "",
  set: (data, index, value) => {
    data[index] = value
  },
  coerce: (value) => (typeof value === "string" ? value : undefined),
}

function layout(
  width: number,
  read: (view: DataView, offset: number) => number,
  write: (view: DataView, offset: number, value: number) => void,
): RawLayout<number> {
  return { width, read, write }
}

export const DTYPE_TRAITS: { [K in keyof NativeDataMap]: DTypeTraits<K> } = {
  float16: numeric(
    (n) => new Float32Array(n),
    layout(
      2,
      (v, o) => f16BitsToF32(v.getUint16(o, true)),
      (v, o, x) => v.setUint16(o, f32ToF16Bits(x), true),
    ),
    (value) => {
      const n = toNumber(value)
      return n === undefined ? undefined : toHalf(n)
    },
    toHalf,
  ),
  float32: numeric(
    (n) => new Float32Array(n),
    layout(
      4,
      (v, o) => v.getFloat32(o, true),
      (v, o, x) => v.setFloat32(o, x, true),
    ),
  ),
  float64: numeric(
    (n) => new Float64Array(n),
    layout(
      8,
      (v, o) => v.getFloat64(o, true),
      (v, o, x) => v.setFloat64(o, x, true),
    ),
  ),
  int8: numeric(
    (n) => new Int8Array(n),
    layout(
      1,
      (v, o) => v.getInt8(o),
      (v, o, x) => v.setInt8(o, x),
    ),
    intRange(-128, 127),
  ),
  int16: numeric(
    (n) => new Int16Array(n),
    layout(
      2,
      (v, o) => v.getInt16(o, true),
      (v, o, x) => v.setInt16(o, x, true),
    ),
    intRange(-32_768, 32_767),
  ),
  int32: numeric(
    (n) => new Int32Array(n),
    layout(
      4,
      (v, o) => v.getInt32(o, true),
      (v, o, x) => v.setInt32(o, x, true),
    ),
    intRange(-2_147_483_648, 2_147_483_647),
  ),
  uint8: numeric(
    (n) => new Uint8Array(n),
    layout(
      1,
      (v, o) => v.getUint8(o),
      (v, o, x) => v.setUint8(o, x),
    ),
    intRange(0, 255),
  ),
  uint16: numeric(
    (n) => new Uint16Array(n),
    layout(
      2,
      (v, o) => v.getUint16(o, true),
      (v, o, x) => v.setUint16(o, x, true),
    ),
    intRange(0, 65_535),
  ),
  uint32: numeric(
    (n) => new Uint32Array(n),
    layout(
      4,
      (v, o) => v.getUint32(o, true),
      (v, o, x) => v.setUint32(o, x, true),
    ),
    intRange(0, 4_294_967_295),
  ),
  int64: wide(
    (n) => new BigInt64Array(n),
    {
      width: 8,
      read: (v, o) => v.getBigInt64(o, true),
      write: (v, o, x) => v.setBigInt64(o, x, true),
    },
    inRange(INT64_MIN, INT64_MAX),
  ),
  uint64: wide(
    (n) => new BigUint64Array(n),
    {
      width: 8,
      read: (v, o) => v.getBigUint64(o, true),
      write: (v, o, x) => v.setBigUint64(o, x, true),
    },
    inRange(0n, UINT64_MAX),
  ),
  bool,
  complex64: complex((n) => new Float32Array(n), 4),
  complex128: complex((n) => new Float64Array(n), 8),
  bytes: byteStrings,
  fixed_bytes: byteStrings,
  str: text,
}

export function traitsOf<K extends NativeType>(dtype: K): DTypeTraits<K> {
  return DTYPE_TRAITS[dtype]
}

const BYTE_STRING_TYPES: ReadonlySet<NativeType> = new Set(["bytes", "fixed_bytes"])

export function isByteStringType(dtype: NativeType): dtype is "bytes" | "fixed_bytes" {
  return BYTE_STRING_TYPES.has(dtype)
}

/** Number of elements held by `data`. */
export function sizeOf<K extends NativeType>(dtype: K, data: NativeDataMap[K]): number {
  return traitsOf(dtype).size(data)
}
