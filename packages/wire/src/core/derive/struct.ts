import type { Codec } from "../../ports/codec"
import { CodecDefinitionError, WriteError } from "../errors"
import { compileFields, decodeFields, encodeFields, type Fields, type StructValue } from "./fields"

/**
 * Derives a codec for a record. Fields are written in declaration order
 * with no names or tags on the wire.
 *
 * @example
 * ```ts
 * const Order = struct("Order", {
 *   id: u64,
 *   items: list(Item),
 *   note: optional(text()),
 *   cachedTotal: skip(() => 0),
 * })
 *
 * type Order = Infer<typeof Order>
 * ```
 */
export function struct<const F extends Fields>(name: string, fields: F): Codec<StructValue<F>> {
  if (!name) throw CodecDefinitionError.of("struct", "a name is required")

  const layout = compileFields(name, fields)

  return {
    name,
    minSize: layout.minSize,

    async encode(value, writer) {
      if (typeof value !== "object" || value === null) {
        throw WriteError.invalidValue(name, "value is not an object")
      }

      await encodeFields(layout, value, writer)
    },

    async decode(reader) {
      const record = await decodeFields(layout, reader)

      return record as StructValue<F>
    },
  }
}
