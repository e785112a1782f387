import { BaseError } from "@tensorwire/errors"

export type TensorErrorCode =
  | "unknown_native_type"
  | "unknown_logical_type"
  | "invalid_string_element"
  | "unsupported_encoding"
  | "invalid_payload_length"
  | "invalid_values"
  | "invalid_dimensions"
  | "truncated_payload"

export type PayloadForm = "tensor_content" | "value_list"

export class TensorError extends BaseError<TensorErrorCode> {
  static unknownNativeType(nativeType: string): TensorError {
    return new TensorError(`Could not infer a logical type for native type ${nativeType}`, {
      code: "unknown_native_type",
      context: { nativeType },
    })
  }

  static unknownLogicalType(logicalType: string): TensorError {
    return new TensorError(`Could not infer a native type for logical type ${logicalType}`, {
      code: "unknown_logical_type",
      context: { logicalType },
    })
  }

  static invalidStringElement(input: { index: number; received: string }): TensorError {
    return new TensorError(
      `Expected a byte string at element ${input.index}, got ${input.received}`,
      {
        code: "invalid_string_element",
        context: { index: input.index, received: input.received },
      },
    )
  }

  static unsupportedEncoding(input: { logicalType: string; form: PayloadForm }): TensorError {
    return new TensorError(
      `Logical type ${input.logicalType} cannot be decoded from ${input.form}`,
      {
        code: "unsupported_encoding",
        context: { logicalType: input.logicalType, form: input.form },
      },
    )
  }

  static invalidPayloadLength(input: {
    logicalType: string
    form: PayloadForm
    expected: number
    received: number
  }): TensorError {
    const unit = input.form === "tensor_content" ? "bytes" : "values"
    return new TensorError(
      `Expected ${input.expected} ${unit} for ${input.logicalType}, got ${input.received}`,
      {
        code: "invalid_payload_length",
        context: { ...input },
      },
    )
  }

  static truncatedPayload(input: {
    logicalType: string
    expected: number
    received: number
  }): TensorError {
    return new TensorError(
      `Value list for ${input.logicalType} holds ${input.received} of ${input.expected} values`,
      {
        code: "truncated_payload",
        context: { ...input },
      },
    )
  }

  static invalidValues(reason: string, context: Record<string, unknown> = {}): TensorError {
    return new TensorError(reason, {
      code: "invalid_values",
      context,
    })
  }

  static invalidDimensions(dims: readonly number[]): TensorError {
    return new TensorError(`Tensor shape [${dims.join(", ")}] has an invalid dimension`, {
      code: "invalid_dimensions",
      context: { dims: [...dims] },
    })
  }
}
