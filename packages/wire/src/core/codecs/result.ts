import type { Codec } from "../../ports/codec"
import { ReadError } from "../errors"

export type WireResult<T, E> = { success: true; value: T } | { success: false; error: E }

/**
 * One discriminant byte, 0 for success and 1 for failure, then that arm's payload.
 */
export function result<T, E>(ok: Codec<T>, err: Codec<E>): Codec<WireResult<T, E>> {
  const name = `result<${ok.name}, ${err.name}>`

  return {
    name,
    minSize: 1 + Math.min(ok.minSize, err.minSize),

    async encode(value, writer) {
      if (value.success) {
        await writer.write(Uint8Array.of(0))
        await ok.encode(value.value, writer)
      } else {
        await writer.write(Uint8Array.of(1))
        await err.encode(value.error, writer)
      }
    },

    async decode(reader) {
      const [tag = 0] = await reader.read(1)

      if (tag === 0) return { success: true, value: await ok.decode(reader) }
      if (tag === 1) return { success: false, error: await err.decode(reader) }
      throw ReadError.unknownVariant(name, tag)
    },
  }
}
