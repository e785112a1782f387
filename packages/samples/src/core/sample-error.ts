import { BaseError } from "@tensorwire/errors"

export type SampleErrorCode =
  | "missing_feature"
  | "invalid_length"
  | "invalid_shape"
  | "incompatible_feature_type"
  | "invalid_feature_count"

export class SampleError extends BaseError<SampleErrorCode> {
  static missingFeature(feature: string): SampleError {
    return new SampleError(`Missing feature ${feature} in request inputs`, {
      code: "missing_feature",
      context: { feature },
    })
  }

  static invalidLength(input: { feature: string; expected: number; received: number }): SampleError {
    return new SampleError(
      `Feature ${input.feature} has ${input.received} samples, expected ${input.expected}`,
      {
        code: "invalid_length",
        context: { ...input },
      },
    )
  }

  static invalidShape(input: { feature: string; shape: readonly number[] }): SampleError {
    return new SampleError(
      `Feature ${input.feature} has shape [${input.shape.join(", ")}], expected [n, 1]`,
      {
        code: "invalid_shape",
        context: { feature: input.feature, shape: [...input.shape] },
      },
    )
  }

  static incompatibleFeatureType(input: {
    feature: string
    nativeType: string
    elementType: string
  }): SampleError {
    return new SampleError(
      `Feature ${input.feature} of type ${input.nativeType} cannot fill a ${input.elementType} matrix`,
      {
        code: "incompatible_feature_type",
        context: { ...input },
      },
    )
  }

  static invalidFeatureCount(input: { nbFeatures: number; featureCount: number }): SampleError {
    return new SampleError(
      `Cannot lay out ${input.featureCount} features in ${input.nbFeatures} columns`,
      {
        code: "invalid_feature_count",
        context: { ...input },
      },
    )
  }
}
