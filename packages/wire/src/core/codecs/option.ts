import type { Codec } from "../../ports/codec"
import { ReadError } from "../errors"

/**
 * One discriminant byte, 0 for absent and 1 for present, then the payload.
 */
export function optional<T>(codec: Codec<T>): Codec<T | undefined> {
  const name = `optional<${codec.name}>`

  return {
    name,
    minSize: 1,

    async encode(value, writer) {
      if (value === undefined) {
        await writer.write(Uint8Array.of(0))
        return
      }

      await writer.write(Uint8Array.of(1))
      await codec.encode(value, writer)
    },

    async decode(reader) {
      const [tag = 0] = await reader.read(1)

      if (tag === 0) return undefined
      if (tag === 1) return codec.decode(reader)
      throw ReadError.unknownVariant(name, tag)
    },
  }
}
