import type { Codec } from "../../ports/codec"
import { ReadError, WriteError } from "../errors"
import { text } from "./binary"

export type ViaMapping<T, P> = {
  name: string
  /** Converts the value into its proxy before writing. */
  to: (value: T) => P
  /** Rebuilds the value from its decoded proxy. May throw to reject it. */
  from: (proxy: P) => T
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Carries `T` on the wire as `P`, using `base` for the bytes.
 */
export function via<T, P>(base: Codec<P>, mapping: ViaMapping<T, P>): Codec<T> {
  return {
    name: mapping.name,
    minSize: base.minSize,

    async encode(value, writer) {
      let proxy: P
      try {
        proxy = mapping.to(value)
      } catch (err) {
        throw WriteError.custom(mapping.name, `cannot convert ${mapping.name}: ${describe(err)}`, err)
      }

      await base.encode(proxy, writer)
    },

    async decode(reader) {
      const proxy = await base.decode(reader)

      try {
        return mapping.from(proxy)
      } catch (err) {
        throw ReadError.custom(mapping.name, `cannot convert ${mapping.name}: ${describe(err)}`, err)
      }
    },
  }
}

export type StringMapping<T> = {
  parse: (value: string) => T
  format?: (value: T) => string
}

/**
 * Carries a value as its text form. `format` defaults to `String(value)`.
 */
export function asString<T>(name: string, mapping: StringMapping<T>): Codec<T> {
  const format = mapping.format ?? ((value: T) => String(value))

  return via(text(), { name, to: format, from: mapping.parse })
}
