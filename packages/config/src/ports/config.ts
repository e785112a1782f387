/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ TENSOR_PADDING: z._default(z.enum(["edge", "reject"]), "edge") }),
 *   sources: [new EnvSource(), new ObjectSource({ TENSOR_PADDING: "reject" })],
 * })
 *
 * config.get("TENSOR_PADDING")     // "reject"
 * config.explain("TENSOR_PADDING") // "object:overrides"
 * ```
 */
export interface IConfig<T> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, deduplicated. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema. Useful for
   * catching typos such as `TENSOR_PADING`.
   */
  unknownKeys(): string[]
}
