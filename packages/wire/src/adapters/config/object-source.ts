import type { ConfigSource } from "../../ports/config-source"

/** In-code values, typically tests or programmatic overrides. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
