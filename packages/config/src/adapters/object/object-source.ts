import type { ConfigSource } from "../../ports/source"

/**
 * In-memory overrides, usually applied after the environment.
 * Keys whose value is `undefined` are left out so they never mask an
 * earlier source.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string
  private readonly values: Readonly<Record<string, unknown>>

  constructor(values: Record<string, unknown>, label = "overrides") {
    this.name = `object:${label}`
    this.values = Object.fromEntries(
      Object.entries(values).filter(([, value]) => value !== undefined),
    )
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
