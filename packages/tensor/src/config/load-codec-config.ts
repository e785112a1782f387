import { type ConfigSource, EnvSource, loadConfig, ObjectSource } from "@tensorwire/config"
import { createPinoLogger, type Logger } from "@tensorwire/logger"
import { type CodecConfig, type CodecEnv, codecEnvSchema, type LoggingConfig } from "./schema"

export type CodecConfigOptions = {
  env?: Record<string, string | undefined>
  /** Only variables carrying this prefix are read, with the prefix stripped. */
  prefix?: string
  /** Applied after the environment, keyed by variable name. */
  overrides?: Record<string, unknown>
}

export function mapEnvToCodecConfig(env: CodecEnv): CodecConfig {
  return {
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
      env: env.APP_ENV,
    },
    tensor: {
      padding: env.TENSOR_PADDING,
      downcast: env.TENSOR_DOWNCAST,
    },
  }
}

export function codecConfigSources(options: CodecConfigOptions = {}): ConfigSource[] {
  const sources: ConfigSource[] = [
    new EnvSource({
      ...(options.env !== undefined && { env: options.env }),
      ...(options.prefix !== undefined && { prefix: options.prefix }),
    }),
  ]
  if (options.overrides) sources.push(new ObjectSource(options.overrides))
  return sources
}

export async function loadCodecConfig(options: CodecConfigOptions = {}): Promise<CodecConfig> {
  const result = await loadConfig({
    schema: codecEnvSchema,
    sources: codecConfigSources(options),
  })

  return mapEnvToCodecConfig(result.value)
}

export function createCodecLogger(config: LoggingConfig): Logger {
  return createPinoLogger(
    {},
    { level: config.level, prettify: config.prettify },
    { service: config.serviceName, env: config.env },
  )
}
