import type { Codec } from "../../ports/codec"
import { CodecDefinitionError, locate, ReadError, WriteError } from "../errors"
import {
  readDiscriminant,
  resolveDiscriminants,
  writeDiscriminant,
} from "./discriminant"
import {
  compileFields,
  decodeFields,
  isIndexLikeKey,
  encodeFields,
  type FieldLayout,
  type Fields,
  type StructValue,
} from "./fields"

export type Variants = Readonly<Record<string, Fields>>

export type UnionValue<V extends Variants, Tag extends string> = {
  [K in keyof V & string]: { [P in Tag]: K } & StructValue<V[K]>
}[keyof V & string]

export type TaggedUnionOptions<V extends Variants, Tag extends string> = {
  /** Property holding the variant name. Default: "kind" */
  tag?: Tag
  /** Pins variants to fixed discriminants so reordering them keeps the wire stable. */
  discriminants?: Partial<Record<keyof V & string, number>>
}

/**
 * Derives a codec for a tagged union: one discriminant, then the chosen
 * variant's fields in declaration order.
 *
 * @example
 * ```ts
 * const Shape = taggedUnion("Shape", {
 *   Circle: { radius: f64 },
 *   Square: { side: f64 },
 *   Empty: {},
 * })
 *
 * await toBytes(Shape, { kind: "Empty" }) // Uint8Array [0x02]
 * ```
 */
export function taggedUnion<const V extends Variants, Tag extends string = "kind">(
  name: string,
  variants: V,
  options: TaggedUnionOptions<V, Tag> = {},
): Codec<UnionValue<V, Tag>> {
  const tag = options.tag ?? "kind"
  const names = Object.keys(variants)

  for (const variant of names) {
    if (isIndexLikeKey(variant)) {
      throw CodecDefinitionError.of(name, `variant "${variant}" looks like an array index`)
    }
  }

  const table = resolveDiscriminants(name, names, options.discriminants)
  const layouts = new Map<string, FieldLayout>()

  for (const [variant, fields] of Object.entries(variants)) {
    if (Object.hasOwn(fields, tag)) {
      throw CodecDefinitionError.of(name, `variant "${variant}" has a field named like the tag "${tag}"`)
    }
    layouts.set(variant, compileFields(`${name}.${variant}`, fields))
  }

  const payloadMin = Math.min(...[...layouts.values()].map((l) => l.minSize))

  return {
    name,
    minSize: names.length === 0 ? 0 : table.width + payloadMin,

    async encode(value, writer) {
      if (typeof value !== "object" || value === null) {
        throw WriteError.invalidValue(name, "value is not an object")
      }

      const variant: unknown = Reflect.get(value, tag)
      const layout = typeof variant === "string" ? layouts.get(variant) : undefined
      const discriminant = typeof variant === "string" ? table.byName.get(variant) : undefined

      if (typeof variant !== "string" || !layout || discriminant === undefined) {
        throw WriteError.invalidValue(name, `unknown variant ${String(variant)}`)
      }

      await writeDiscriminant(writer, table, discriminant)

      try {
        await encodeFields(layout, value, writer)
      } catch (err) {
        throw locate(err, variant)
      }
    },

    async decode(reader) {
      if (names.length === 0) throw ReadError.never(name)

      const discriminant = await readDiscriminant(reader, table)
      const variant = table.byValue.get(discriminant)
      const layout = variant === undefined ? undefined : layouts.get(variant)

      if (variant === undefined || !layout) throw ReadError.unknownVariant(name, discriminant)

      let fields: Record<string, unknown>
      try {
        fields = await decodeFields(layout, reader)
      } catch (err) {
        throw locate(err, variant)
      }

      return { [tag]: variant, ...fields } as UnionValue<V, Tag>
    },
  }
}
