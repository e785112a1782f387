import type { IConfig } from "../ports/config"

export class Config<T> implements IConfig<T> {
  constructor(
    private readonly data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  /** Schema keys, each of which has an entry in the provenance map. */
  keys(): string[] {
    return Object.keys(this.provenance)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  unknownKeys(): string[] {
    const known = new Set(this.keys())

    return [...this.mergedKeys].filter((k) => !known.has(k))
  }
}
