import { type CodecConfig, codecEnvSchema } from "@tensorwire/tensor"
import { z } from "zod/mini"
import { type SampleElementType, sampleElementTypes } from "../core/assemble"

export const samplesEnvSchema = z.extend(codecEnvSchema, {
  SAMPLES_ELEMENT_TYPE: z._default(z.enum(sampleElementTypes), "float64"),
})

export type SamplesEnv = z.infer<typeof samplesEnvSchema>

export type SamplesConfig = CodecConfig & {
  samples: {
    elementType: SampleElementType
  }
}
