import { z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { formatPath } from "../errors"
import type { DecodeOptions } from "../wire"
import { ConfigError } from "./config-error"
import { LoadedConfig } from "./loaded-config"
import { wireConfigSchema, type WireConfigValues } from "./wire-config-schema"

export type WireConfig = LoadedConfig<WireConfigValues>

export type LoadWireConfigOptions = {
  /** Applied in order, later sources winning. Default: the process environment */
  sources?: ConfigSource[]
}

export async function loadWireConfig({ sources }: LoadWireConfigOptions = {}): Promise<WireConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = wireConfigSchema.safeParse(merged)

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: formatPath(i.path.filter((p): p is string | number => typeof p !== "symbol")),
      message: i.message,
    }))

    throw ConfigError.invalid(z.prettifyError(result.error), issues)
  }

  const known = Object.keys(result.data)
  const used: Record<string, string> = {}

  for (const key of known) {
    used[key] = provenance[key] ?? "default"
  }

  return new LoadedConfig(result.data, used, new Set(Object.keys(merged)))
}

export function toDecodeOptions(config: WireConfigValues): DecodeOptions {
  return {
    maxBytes: config.WIRE_MAX_DECODE_BYTES,
    maxDepth: config.WIRE_MAX_DEPTH,
  }
}
