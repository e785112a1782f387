/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen once, against the
 * schema, after all sources are merged. Later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name recorded as the provenance of every key this source supplies.
   * Example: "env", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` counts as not
   * provided.
   */
  load(): Promise<Record<string, unknown>>
}
