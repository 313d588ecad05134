import type { Codec } from "../../ports/codec"
import { ReadError, WriteError } from "../errors"

/**
 * Same bytes as `codec`; zero is refused both ways. A zero on the wire is
 * reported as `unknown_variant`.
 */
export function nonZero<T extends number | bigint>(codec: Codec<T>): Codec<T> {
  const name = `nonZero<${codec.name}>`

  return {
    name,
    minSize: codec.minSize,

    async encode(value, writer) {
      if (value === 0 || value === 0n) throw WriteError.invalidValue(name, "value is zero")
      await codec.encode(value, writer)
    },

    async decode(reader) {
      const value = await codec.decode(reader)
      if (value === 0 || value === 0n) throw ReadError.unknownVariant(name, 0)
      return value
    },
  }
}
