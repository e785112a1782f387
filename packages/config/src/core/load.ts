import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<S extends z.core.$ZodType> = {
  /** Any zod object schema, classic or mini. */
  schema: S
  /** Defaults to a single unprefixed `EnvSource`. */
  sources?: ConfigSource[]
}

export async function loadConfig<S extends z.core.$ZodType>({
  schema,
  sources,
}: LoadConfigOptions<S>): Promise<IConfig<z.output<S>>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.map(String).join("."),
      message: i.message,
    }))
    throw ConfigError.invalid(z.prettifyError(result.error), issues)
  }

  const data = result.data
  if (typeof data !== "object" || data === null) {
    throw ConfigError.invalid("schema must produce an object", [])
  }

  const used: Record<string, string> = {}
  for (const key of Object.keys(data)) {
    used[key] = provenance[key] ?? "default"
  }

  return new Config<z.output<S>>(data, used, new Set(Object.keys(merged)))
}
