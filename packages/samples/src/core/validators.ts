import { dimsOf, type NDArray, type WireTensor } from "@tensorwire/tensor"
import { SampleError } from "./sample-error"

export type RequestInputs = Readonly<Record<string, WireTensor>> | ReadonlyMap<string, WireTensor>

/** The tensor sent for `featureName`; fails with `missing_feature` when absent. */
export function checkFeatureExists(requestInputs: RequestInputs, featureName: string): WireTensor {
  const tensor =
    isMap(requestInputs)
      ? requestInputs.get(featureName)
      : Object.hasOwn(requestInputs, featureName)
        ? requestInputs[featureName]
        : undefined
  if (tensor === undefined) throw SampleError.missingFeature(featureName)
  return tensor
}

function isMap(inputs: RequestInputs): inputs is ReadonlyMap<string, WireTensor> {
  return inputs instanceof Map
}

/** The declared first dimension must match the number of samples. */
export function checkValidLength(tensor: WireTensor, nbSamples: number, featureName: string): void {
  const dims = dimsOf(tensor)
  const [first] = dims
  if (first === undefined) throw SampleError.invalidShape({ feature: featureName, shape: dims })
  if (first !== nbSamples) {
    throw SampleError.invalidLength({ feature: featureName, expected: nbSamples, received: first })
  }
}

/** A feature column arrives as a 2-D `[n, 1]` array. */
export function checkArrayShape(array: NDArray, featureName: string): void {
  if (array.shape.length !== 2 || array.shape[1] !== 1) {
    throw SampleError.invalidShape({ feature: featureName, shape: array.shape })
  }
}
