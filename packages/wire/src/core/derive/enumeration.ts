import type { Codec } from "../../ports/codec"
import { CodecDefinitionError, ReadError, WriteError } from "../errors"
import { readDiscriminant, resolveDiscriminants, writeDiscriminant } from "./discriminant"

export type EnumerationOptions<M extends string> = {
  discriminants?: Partial<Record<M, number>>
}

/**
 * A string-literal enum carried as its discriminant alone.
 */
export function enumeration<const M extends readonly string[]>(
  name: string,
  members: M,
  options: EnumerationOptions<M[number]> = {},
): Codec<M[number]> {
  if (new Set(members).size !== members.length) {
    throw CodecDefinitionError.of(name, "members must be unique")
  }

  const table = resolveDiscriminants(name, members, options.discriminants)
  const known = new Map<string, M[number]>(members.map((m) => [m, m]))

  return {
    name,
    minSize: members.length === 0 ? 0 : table.width,

    async encode(value, writer) {
      const discriminant = table.byName.get(value)

      if (discriminant === undefined) {
        throw WriteError.invalidValue(name, `${String(value)} is not a member`)
      }

      await writeDiscriminant(writer, table, discriminant)
    },

    async decode(reader) {
      if (members.length === 0) throw ReadError.never(name)

      const discriminant = await readDiscriminant(reader, table)
      const member = known.get(table.byValue.get(discriminant) ?? "")

      if (member === undefined) throw ReadError.unknownVariant(name, discriminant)

      return member
    },
  }
}
