import { type LogicalType, LogicalTypes } from "../ports/logical-type"
import type { NativeType } from "../ports/native-type"
import { DTYPE_TRAITS } from "./dtypes"
import { TensorError } from "./tensor-error"

/**
 * Every pair the codec can translate. Both lookup maps below derive from this
 * table, so the two directions stay inverse on the listed entries.
 */
const TYPE_TABLE: readonly (readonly [LogicalType, NativeType])[] = [
  [LogicalTypes.Half, "float16"],
  [LogicalTypes.Float, "float32"],
  [LogicalTypes.Double, "float64"],
  [LogicalTypes.Int32, "int32"],
  [LogicalTypes.Uint8, "uint8"],
  [LogicalTypes.Uint16, "uint16"],
  [LogicalTypes.Uint32, "uint32"],
  [LogicalTypes.Uint64, "uint64"],
  [LogicalTypes.Int16, "int16"],
  [LogicalTypes.Int8, "int8"],
  [LogicalTypes.String, "bytes"],
  [LogicalTypes.Complex64, "complex64"],
  [LogicalTypes.Complex128, "complex128"],
  [LogicalTypes.Int64, "int64"],
  [LogicalTypes.Bool, "bool"],
]
Object.freeze(TYPE_TABLE)

const LOGICAL_TO_NATIVE: ReadonlyMap<number, NativeType> = new Map<number, NativeType>(TYPE_TABLE)

const NATIVE_TO_LOGICAL: ReadonlyMap<NativeType, LogicalType> = new Map<NativeType, LogicalType>([
  ...TYPE_TABLE.map(([logical, native]) => [native, logical] as const),
  ["fixed_bytes", LogicalTypes.String],
  ["str", LogicalTypes.String],
])

const LOGICAL_NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(LogicalTypes).map(([name, code]) => [code, name.toLowerCase()]),
)

/** Readable name of a wire code, `code(N)` when the code is not in the enumeration. */
export function logicalTypeName(code: number): string {
  return LOGICAL_NAMES.get(code) ?? `code(${code})`
}

export function logicalTypeOf(nativeType: NativeType): LogicalType {
  const logical = NATIVE_TO_LOGICAL.get(nativeType)
  if (logical === undefined) throw TensorError.unknownNativeType(nativeType)
  return logical
}

export function nativeTypeOf(logicalType: number): NativeType {
  const native = LOGICAL_TO_NATIVE.get(logicalType)
  if (native === undefined) throw TensorError.unknownLogicalType(logicalTypeName(logicalType))
  return native
}

/** Bytes per element in the raw-bytes form; `undefined` for byte strings. */
export function elementByteWidth(nativeType: NativeType): number | undefined {
  return DTYPE_TRAITS[nativeType].raw?.width
}

