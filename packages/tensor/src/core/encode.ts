import type { Logger } from "@tensorwire/logger"
import { LogicalTypes } from "../ports/logical-type"
import type {
  NDArray,
  NativeDataMap,
  NativeType,
  NestedValues,
  Scalar,
  Shape,
} from "../ports/native-type"
import type { WireTensor } from "../ports/wire-tensor"
import { isByteStringType, sizeOf, traitsOf } from "./dtypes"
import { describeLeaf, flatten, inferNativeType } from "./nested"
import { logicalTypeOf } from "./registry"
import { elementCount, isValidShape, toTensorShape } from "./shape"
import { TensorError } from "./tensor-error"

export type EncodeOptions = Readonly<{
  /** Element type to encode as. Inferred from the values when absent. */
  dtype?: NativeType
  /** Narrow float64 to float32 and int64 to int32 where lossless. Default: true */
  downcast?: boolean
  logger?: Logger
}>

const INT32_MIN = -(2n ** 31n)
const INT32_MAX = 2n ** 31n - 1n

/**
 * Encode a scalar or nested arrays of scalars.
 *
 * @example
 * ```ts
 * encode([1.5, 2, 3])
 * // { dtype: LogicalTypes.Float, tensorShape: { dim: [{ size: 3 }] }, tensorContent: <12 bytes> }
 * ```
 */
export function encode(values: NestedValues, options: EncodeOptions = {}): WireTensor {
  const { shape, leaves } = flatten(values)
  const dtype = options.dtype ?? inferNativeType(leaves)
  return encodeArray(fromLeaves(dtype, shape, leaves), options)
}

/** Encode an already shaped array. `data` must hold exactly one element per shape slot. */
export function encodeArray(array: NDArray, options: EncodeOptions = {}): WireTensor {
  if (!isValidShape(array.shape)) throw TensorError.invalidDimensions(array.shape)

  const expected = elementCount(array.shape)
  const received = sizeOf(array.dtype, array.data)
  if (received !== expected) {
    throw TensorError.invalidValues(
      `Shape [${array.shape.join(", ")}] needs ${expected} elements, got ${received}`,
      { nativeType: array.dtype, expected, received },
    )
  }

  const narrowed = options.downcast === false ? array : downcast(array, options.logger)
  return toWire(narrowed.dtype, narrowed.shape, narrowed.data)
}

function fromLeaves<K extends NativeType>(
  dtype: K,
  shape: Shape,
  leaves: readonly Scalar[],
): NDArray<K> {
  const traits = traitsOf(dtype)
  const data = traits.alloc(leaves.length)

  leaves.forEach((leaf, index) => {
    const value = traits.coerce(leaf)
    if (value === undefined) {
      if (isByteStringType(dtype)) {
        throw TensorError.invalidStringElement({ index, received: describeLeaf(leaf) })
      }
      throw TensorError.invalidValues(`Cannot store ${describeLeaf(leaf)} element ${index} as ${dtype}`, {
        index,
        nativeType: dtype,
      })
    }
    traits.set(data, index, value)
  })

  return { dtype, shape, data }
}

function downcast(array: NDArray, logger?: Logger): NDArray {
  if (array.dtype === "float64") {
    logger?.debug("Narrowed float64 values to float32", {
      nativeType: "float64",
      count: array.data.length,
    })
    return { dtype: "float32", shape: array.shape, data: Float32Array.from(array.data) }
  }

  if (array.dtype === "int64" && array.data.every((v) => v >= INT32_MIN && v <= INT32_MAX)) {
    logger?.debug("Narrowed int64 values to int32", {
      nativeType: "int64",
      count: array.data.length,
    })
    return {
      dtype: "int32",
      shape: array.shape,
      data: Int32Array.from(array.data, (v) => Number(v)),
    }
  }

  return array
}

function toWire<K extends NativeType>(dtype: K, shape: Shape, data: NativeDataMap[K]): WireTensor {
  const logicalType = logicalTypeOf(dtype)
  const traits = traitsOf(dtype)
  const count = traits.size(data)
  const tensorShape = toTensorShape(shape)

  if (logicalType === LogicalTypes.String) {
    const stringVal: Uint8Array[] = []
    for (let index = 0; index < count; index++) {
      const element = traits.get(data, index)
      if (!(element instanceof Uint8Array)) {
        throw TensorError.invalidStringElement({ index, received: typeof element })
      }
      stringVal.push(element.slice())
    }
    return { dtype: logicalType, tensorShape, stringVal }
  }

  const raw = traits.raw
  if (raw === undefined) {
    throw TensorError.unsupportedEncoding({ logicalType: dtype, form: "tensor_content" })
  }

  const tensorContent = new Uint8Array(count * raw.width)
  const view = new DataView(tensorContent.buffer)
  for (let index = 0; index < count; index++) {
    raw.write(view, index * raw.width, traits.get(data, index))
  }

  return { dtype: logicalType, tensorShape, tensorContent }
}
