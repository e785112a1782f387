import type { Logger } from "@tensorwire/logger"
import { type LogicalType, LogicalTypes } from "../ports/logical-type"
import type { NDArray, NativeDataMap, NativeType, Scalar, Shape } from "../ports/native-type"
import type { WireTensor } from "../ports/wire-tensor"
import { traitsOf } from "./dtypes"
import { logicalTypeName, nativeTypeOf } from "./registry"
import { dimsOf, elementCount } from "./shape"
import { TensorError } from "./tensor-error"

/**
 * What to do when a value list holds fewer values than the shape needs.
 * `edge` repeats the last value, `reject` fails with `truncated_payload`.
 */
export type PaddingPolicy = "edge" | "reject"

export type DecodeOptions = Readonly<{
  /** Default: "edge" */
  padding?: PaddingPolicy
  logger?: Logger
}>

/**
 * Decode a wire tensor into a fresh array of its declared shape. The result
 * never shares memory with `tensor`.
 */
export function decode(tensor: WireTensor, options: DecodeOptions = {}): NDArray {
  const dtype = nativeTypeOf(tensor.dtype)
  const shape = dimsOf(tensor)
  return decodeAs(dtype, tensor, shape, options)
}

function decodeAs<K extends NativeType>(
  dtype: K,
  tensor: WireTensor,
  shape: Shape,
  options: DecodeOptions,
): NDArray<K> {
  const content = tensor.tensorContent
  const data =
    content !== undefined && content.length > 0
      ? fromContent(dtype, tensor.dtype, shape, content)
      : fromValueList(dtype, tensor, shape, options)
  return { dtype, shape, data }
}

function fromContent<K extends NativeType>(
  dtype: K,
  logicalType: LogicalType,
  shape: Shape,
  content: Uint8Array,
): NativeDataMap[K] {
  const traits = traitsOf(dtype)
  const raw = traits.raw
  if (raw === undefined) {
    throw TensorError.unsupportedEncoding({
      logicalType: logicalTypeName(logicalType),
      form: "tensor_content",
    })
  }

  const count = elementCount(shape)
  const expected = count * raw.width
  if (content.length !== expected) {
    throw TensorError.invalidPayloadLength({
      logicalType: logicalTypeName(logicalType),
      form: "tensor_content",
      expected,
      received: content.length,
    })
  }

  const view = new DataView(content.buffer, content.byteOffset, content.byteLength)
  const data = traits.alloc(count)
  for (let index = 0; index < count; index++) {
    traits.set(data, index, raw.read(view, index * raw.width))
  }
  return data
}

function valueListOf(tensor: WireTensor): readonly Scalar[] {
  switch (tensor.dtype) {
    case LogicalTypes.Float:
      return tensor.floatVal ?? []
    case LogicalTypes.Double:
      return tensor.doubleVal ?? []
    case LogicalTypes.Int8:
    case LogicalTypes.Int16:
    case LogicalTypes.Int32:
    case LogicalTypes.Int64:
    case LogicalTypes.Uint8:
    case LogicalTypes.Uint16:
    case LogicalTypes.Uint32:
    case LogicalTypes.Uint64:
      return tensor.intVal ?? []
    case LogicalTypes.Bool:
      return tensor.boolVal ?? []
    case LogicalTypes.String:
      return tensor.stringVal ?? []
    default:
      throw TensorError.unsupportedEncoding({
        logicalType: logicalTypeName(tensor.dtype),
        form: "value_list",
      })
  }
}

function fromValueList<K extends NativeType>(
  dtype: K,
  tensor: WireTensor,
  shape: Shape,
  options: DecodeOptions,
): NativeDataMap[K] {
  const values = valueListOf(tensor)
  const traits = traitsOf(dtype)
  const count = elementCount(shape)
  const data = traits.alloc(count)
  const logicalType = logicalTypeName(tensor.dtype)

  const last = values[values.length - 1]
  if (last === undefined) return data

  if (values.length > count) {
    throw TensorError.invalidPayloadLength({
      logicalType,
      form: "value_list",
      expected: count,
      received: values.length,
    })
  }

  if (values.length < count) {
    if (options.padding === "reject") {
      throw TensorError.truncatedPayload({ logicalType, expected: count, received: values.length })
    }
    options.logger?.warn("Padded short value list by repeating its last value", {
      logicalType,
      nativeType: dtype,
      expected: count,
      received: values.length,
    })
  }

  for (let index = 0; index < count; index++) {
    const source = index < values.length ? values[index] : last
    const value = source === undefined ? undefined : traits.coerce(source)
    if (value === undefined) {
      throw TensorError.invalidValues(`Value ${index} of ${logicalType} cannot be stored as ${dtype}`, {
        index,
        logicalType,
        nativeType: dtype,
      })
    }
    traits.set(data, index, value)
  }
  return data
}
