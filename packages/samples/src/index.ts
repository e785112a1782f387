export { createSampleAssembler } from "./composition/create-sample-assembler"
export { loadSamplesConfig, mapEnvToSamplesConfig } from "./config/load-samples-config"
export { type SamplesConfig, type SamplesEnv, samplesEnvSchema } from "./config/schema"
export {
  type AssembleOptions,
  assemble,
  type SampleElementType,
  type SampleMatrix,
  sampleElementTypes,
} from "./core/assemble"
export {
  SampleAssembler,
  type SampleAssemblerDeps,
  type SampleAssemblerSettings,
} from "./core/sample-assembler"
export { SampleError, type SampleErrorCode } from "./core/sample-error"
export {
  checkArrayShape,
  checkFeatureExists,
  checkValidLength,
  type RequestInputs,
} from "./core/validators"
