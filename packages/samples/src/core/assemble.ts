import {
  type DecodeOptions,
  decode,
  dimsOf,
  type NDArray,
  type NativeType,
  traitsOf,
  type WireTensor,
} from "@tensorwire/tensor"
import { SampleError } from "./sample-error"
import {
  checkArrayShape,
  checkFeatureExists,
  checkValidLength,
  type RequestInputs,
} from "./validators"

/** Element types a sample matrix can hold: real numbers and booleans. */
export const sampleElementTypes = [
  "float16",
  "float32",
  "float64",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "bool",
] as const satisfies readonly NativeType[]

export type SampleElementType = (typeof sampleElementTypes)[number]

/** `[nbSamples, nbFeatures]`, row-major, one column per feature. */
export type SampleMatrix = NDArray<SampleElementType>

export type AssembleOptions = DecodeOptions

type Feature = {
  name: string
  tensor: WireTensor
}

/**
 * Decode the named features of a request and lay them out as the columns of
 * one matrix. Columns past the last feature stay zero.
 *
 * @example
 * ```ts
 * const matrix = assemble(inputs, ["age", "income"], 2)
 * matrix.shape // [nbSamples, 2]
 * ```
 */
export function assemble(
  requestInputs: RequestInputs,
  featureNames: readonly string[],
  nbFeatures: number,
  elementType: SampleElementType = "float64",
  options: AssembleOptions = {},
): SampleMatrix {
  const features: Feature[] = featureNames.map((name) => ({
    name,
    tensor: checkFeatureExists(requestInputs, name),
  }))

  if (!Number.isSafeInteger(nbFeatures) || nbFeatures < features.length) {
    throw SampleError.invalidFeatureCount({ nbFeatures, featureCount: features.length })
  }

  return fill(elementType, features, countSamples(features), nbFeatures, options)
}

function countSamples(features: readonly Feature[]): number {
  const [first] = features
  if (first === undefined) return 0

  const [size] = dimsOf(first.tensor)
  if (size === undefined) {
    throw SampleError.invalidShape({ feature: first.name, shape: [] })
  }
  return size
}

function fill<K extends SampleElementType>(
  elementType: K,
  features: readonly Feature[],
  nbSamples: number,
  nbFeatures: number,
  options: AssembleOptions,
): NDArray<K> {
  const traits = traitsOf(elementType)
  const data = traits.alloc(nbSamples * nbFeatures)

  features.forEach(({ name, tensor }, column) => {
    checkValidLength(tensor, nbSamples, name)
    const array = decode(tensor, options)
    checkArrayShape(array, name)

    const values = columnValues(array, name, elementType)
    for (let row = 0; row < nbSamples; row++) {
      const source = values[row]
      const value = source === undefined ? undefined : traits.coerce(source)
      if (value === undefined) {
        throw SampleError.incompatibleFeatureType({
          feature: name,
          nativeType: array.dtype,
          elementType,
        })
      }
      traits.set(data, row * nbFeatures + column, value)
    }
  })

  return { dtype: elementType, shape: [nbSamples, nbFeatures], data }
}

function columnValues(
  array: NDArray,
  feature: string,
  elementType: SampleElementType,
): ArrayLike<number | bigint | boolean> {
  switch (array.dtype) {
    case "complex64":
    case "complex128":
    case "bytes":
    case "fixed_bytes":
    case "str":
      throw SampleError.incompatibleFeatureType({ feature, nativeType: array.dtype, elementType })
    case "bool":
      return Array.from(array.data, (flag) => flag !== 0)
    default:
      return array.data
  }
}
