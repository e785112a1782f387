import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are loaded, with the prefix stripped. */
  prefix?: string
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
}

/**
 * Reads environment variables. A variable set to an empty string counts as
 * unset, so `TENSOR_PADDING=` falls through to the schema default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const prefix = this.options.prefix ?? ""
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.options.env ?? process.env)) {
      if (value === undefined || value === "" || !key.startsWith(prefix)) continue
      values[key.slice(prefix.length)] = value
    }

    return values
  }
}
