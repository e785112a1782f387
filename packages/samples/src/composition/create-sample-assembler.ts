import type { SamplesConfig } from "../config/schema"
import { SampleAssembler, type SampleAssemblerDeps } from "../core/sample-assembler"

/** Build an assembler from loaded configuration. */
export function createSampleAssembler(
  config: Pick<SamplesConfig, "samples" | "tensor">,
  deps: SampleAssemblerDeps = {},
): SampleAssembler {
  return new SampleAssembler(
    { elementType: config.samples.elementType, padding: config.tensor.padding },
    deps,
  )
}
