export { createTensorCodec, type TensorCodec, type TensorCodecDeps } from "./composition/create-tensor-codec"
export {
  type CodecConfigOptions,
  codecConfigSources,
  createCodecLogger,
  loadCodecConfig,
  mapEnvToCodecConfig,
} from "./config/load-codec-config"
export {
  type CodecConfig,
  type CodecEnv,
  codecEnvSchema,
  type LoggingConfig,
  paddingPolicies,
  type TensorCodecSettings,
} from "./config/schema"
export { DTYPE_TRAITS, type DTypeTraits, isByteStringType, sizeOf, traitsOf } from "./core/dtypes"
export { type DecodeOptions, decode, type PaddingPolicy } from "./core/decode"
export { type EncodeOptions, encode, encodeArray } from "./core/encode"
export { elementByteWidth, logicalTypeName, logicalTypeOf, nativeTypeOf } from "./core/registry"
export { dimsOf, elementCount, toTensorShape } from "./core/shape"
export { type PayloadForm, TensorError, type TensorErrorCode } from "./core/tensor-error"
export { type LogicalType, type LogicalTypeName, LogicalTypes } from "./ports/logical-type"
export type {
  Complex,
  NativeDataMap,
  NativeElementMap,
  NativeType,
  NDArray,
  NestedValues,
  Scalar,
  Shape,
} from "./ports/native-type"
export type { TensorShape, TensorShapeDim, WireTensor } from "./ports/wire-tensor"
