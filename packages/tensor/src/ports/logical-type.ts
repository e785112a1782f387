/**
 * Wire data-type codes. The numbering is fixed by the external tensor
 * schema; only the codes with a registry entry can be encoded or decoded.
 */
export const LogicalTypes = {
  Invalid: 0,
  Float: 1,
  Double: 2,
  Int32: 3,
  Uint8: 4,
  Int16: 5,
  Int8: 6,
  String: 7,
  Complex64: 8,
  Int64: 9,
  Bool: 10,
  Qint8: 11,
  Quint8: 12,
  Qint32: 13,
  Bfloat16: 14,
  Qint16: 15,
  Quint16: 16,
  Uint16: 17,
  Complex128: 18,
  Half: 19,
  Resource: 20,
  Variant: 21,
  Uint32: 22,
  Uint64: 23,
} as const

export type LogicalTypeName = keyof typeof LogicalTypes

export type LogicalType = (typeof LogicalTypes)[LogicalTypeName]
