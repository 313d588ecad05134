import type { Codec } from "../../ports/codec"
import { CodecDefinitionError, WriteError } from "../errors"

/**
 * A set of named flags carried as one unsigned integer, flag `i` in bit
 * `i`. Bits with no name are dropped on decode.
 *
 * @example
 * ```ts
 * const Perms = flags("Perms", u8, ["read", "write", "exec"])
 *
 * await toBytes(Perms, new Set(["read", "exec"])) // Uint8Array [0x05]
 * ```
 */
export function flags<const N extends readonly string[]>(
  name: string,
  repr: Codec<number>,
  names: N,
): Codec<Set<N[number]>> {
  const capacity = Math.min(repr.minSize * 8, 32)

  if (names.length > capacity) {
    throw CodecDefinitionError.of(name, `${names.length} flags do not fit in ${repr.name}`)
  }
  if (new Set(names).size !== names.length) {
    throw CodecDefinitionError.of(name, "flag names must be unique")
  }

  const bits = new Map<string, number>(names.map((flag, index) => [flag, 2 ** index]))

  return {
    name,
    minSize: repr.minSize,

    async encode(value, writer) {
      let raw = 0

      for (const flag of value) {
        const bit = bits.get(flag)
        if (bit === undefined) throw WriteError.invalidValue(name, `unknown flag ${String(flag)}`)
        raw += bit
      }

      await repr.encode(raw, writer)
    },

    async decode(reader) {
      const raw = await repr.decode(reader)

      return new Set(names.filter((_, index) => Math.floor(raw / 2 ** index) % 2 === 1))
    },
  }
}
