import { createNullLogger, type Logger } from "@tensorwire/logger"
import { decode } from "../core/decode"
import { encode, encodeArray } from "../core/encode"
import type { TensorCodecSettings } from "../config/schema"
import type { NDArray, NativeType, NestedValues } from "../ports/native-type"
import type { WireTensor } from "../ports/wire-tensor"

export type TensorCodec = {
  encode(values: NestedValues, dtype?: NativeType): WireTensor
  encodeArray(array: NDArray): WireTensor
  decode(tensor: WireTensor): NDArray
}

export type TensorCodecDeps = {
  logger?: Logger
}

const DEFAULT_SETTINGS: TensorCodecSettings = { padding: "edge", downcast: true }

/**
 * Bind codec settings and a logger once, for callers that encode and decode
 * many tensors under the same configuration.
 */
export function createTensorCodec(
  settings: Partial<TensorCodecSettings> = {},
  deps: TensorCodecDeps = {},
): TensorCodec {
  const { padding, downcast } = { ...DEFAULT_SETTINGS, ...settings }
  const logger = (deps.logger ?? createNullLogger()).child({ module: "tensor-codec" })

  return {
    encode: (values, dtype) =>
      encode(values, { downcast, logger, ...(dtype !== undefined && { dtype }) }),
    encodeArray: (array) => encodeArray(array, { downcast, logger }),
    decode: (tensor) => decode(tensor, { padding, logger }),
  }
}
