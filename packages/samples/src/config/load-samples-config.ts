import { loadConfig } from "@tensorwire/config"
import { type CodecConfigOptions, codecConfigSources, mapEnvToCodecConfig } from "@tensorwire/tensor"
import { type SamplesConfig, type SamplesEnv, samplesEnvSchema } from "./schema"

export function mapEnvToSamplesConfig(env: SamplesEnv): SamplesConfig {
  return {
    ...mapEnvToCodecConfig(env),
    samples: {
      elementType: env.SAMPLES_ELEMENT_TYPE,
    },
  }
}

export async function loadSamplesConfig(options: CodecConfigOptions = {}): Promise<SamplesConfig> {
  const result = await loadConfig({
    schema: samplesEnvSchema,
    sources: codecConfigSources(options),
  })

  return mapEnvToSamplesConfig(result.value)
}
