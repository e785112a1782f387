import { type LogLevelName, logLevelNames } from "@tensorwire/logger"
import { z } from "zod/mini"
import type { PaddingPolicy } from "../core/decode"

export const paddingPolicies = ["edge", "reject"] as const satisfies readonly PaddingPolicy[]

export const codecEnvSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "tensorwire"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  TENSOR_PADDING: z._default(z.enum(paddingPolicies), "edge"),
  TENSOR_DOWNCAST: z._default(z.stringbool(), true),
})

export type CodecEnv = z.infer<typeof codecEnvSchema>

export type LoggingConfig = {
  level: LogLevelName
  prettify: boolean
  serviceName: string
  env: string
}

export type TensorCodecSettings = {
  padding: PaddingPolicy
  downcast: boolean
}

export type CodecConfig = {
  logging: LoggingConfig
  tensor: TensorCodecSettings
}
