/**
 * Validated configuration plus where each value came from.
 */
export class LoadedConfig<T extends Record<string, unknown>> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  /** Name of the source that supplied `key`, or "default". */
  explain(key: keyof T & string): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.mergedKeys].filter((k) => !known.has(k))
  }
}
