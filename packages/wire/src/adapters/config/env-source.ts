import type { ConfigSource } from "../../ports/config-source"

const NAMESPACE = "WIRE_"

export type EnvSourceOptions = {
  /** Read `<prefix>WIRE_*` instead of `WIRE_*`; the prefix is stripped. */
  prefix?: string
  /** Default: `process.env`, read on every load */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Environment variables in the `WIRE_` namespace. Everything else in the
 * environment is ignored, so it never shows up as an unknown key.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const env = this.options.env ?? process.env
    const wanted = this.prefix + NAMESPACE

    return Object.fromEntries(
      Object.entries(env)
        .filter(([key, value]) => key.startsWith(wanted) && value !== undefined)
        .map(([key, value]): [string, unknown] => [key.slice(this.prefix.length), value]),
    )
  }
}
