import type { Codec, Infer } from "../../ports/codec"
import { tryAllocateArray } from "../budget"
import { CodecDefinitionError, locate, WriteError } from "../errors"

export type TupleValue<C extends readonly Codec<unknown>[]> = { -readonly [K in keyof C]: Infer<C[K]> }

/**
 * Elements in order with no length prefix; the arity is part of the type.
 */
export function tuple<const C extends readonly Codec<unknown>[]>(...codecs: C): Codec<TupleValue<C>> {
  const name = `[${codecs.map((c) => c.name).join(", ")}]`

  return {
    name,
    minSize: codecs.reduce((sum, c) => sum + c.minSize, 0),

    async encode(value, writer) {
      const items: readonly unknown[] = value

      if (items.length !== codecs.length) {
        throw WriteError.invalidValue(name, `expected ${codecs.length} elements, got ${items.length}`)
      }

      for (const [index, codec] of codecs.entries()) {
        try {
          await codec.encode(items[index], writer)
        } catch (err) {
          throw locate(err, index)
        }
      }
    },

    async decode(reader) {
      const out: unknown[] = []

      for (const [index, codec] of codecs.entries()) {
        try {
          out.push(await codec.decode(reader))
        } catch (err) {
          throw locate(err, index)
        }
      }

      return out as TupleValue<C>
    },
  }
}

/**
 * Exactly `length` elements with no length prefix.
 */
export function fixedArray<T>(codec: Codec<T>, length: number): Codec<T[]> {
  const name = `${codec.name}[${length}]`

  if (!Number.isSafeInteger(length) || length < 0) {
    throw CodecDefinitionError.of(name, `length ${length} is not a non-negative integer`)
  }

  return {
    name,
    minSize: codec.minSize * length,

    async encode(value, writer) {
      if (value.length !== length) {
        throw WriteError.invalidValue(name, `expected ${length} elements, got ${value.length}`)
      }

      for (const [index, item] of value.entries()) {
        try {
          await codec.encode(item, writer)
        } catch (err) {
          throw locate(err, index)
        }
      }
    },

    async decode(reader) {
      const reservation = reader.budget.reserve(length, codec.minSize, name)

      try {
        const out: T[] = codec.minSize > 0 ? tryAllocateArray<T>(length, name) : []

        for (let index = 0; index < length; index++) {
          reservation.shrink()
          try {
            out[index] = await codec.decode(reader)
          } catch (err) {
            throw locate(err, index)
          }
        }

        return out
      } finally {
        reservation.release()
      }
    },
  }
}
