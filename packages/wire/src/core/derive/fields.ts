import type { Codec, WireReader, WireWriter } from "../../ports/codec"
import { CodecDefinitionError, locate } from "../errors"

const SKIPPED = Symbol("wirepact.skipped")

/**
 * A field that lives only in memory. It is never written; decode rebuilds
 * it with `create()`.
 */
export type SkippedField<T> = {
  readonly [SKIPPED]: true
  readonly create: () => T
}

export type FieldSpec = Codec<unknown> | SkippedField<unknown>

export type Fields = Readonly<Record<string, FieldSpec>>

export type FieldValue<F> =
  F extends SkippedField<infer T> ? T : F extends Codec<infer T> ? T : never

export type StructValue<F extends Fields> = { -readonly [K in keyof F]: FieldValue<F[K]> }

export function skip<T>(create: () => T): SkippedField<T> {
  return { [SKIPPED]: true, create }
}

export function isSkipped(spec: FieldSpec): spec is SkippedField<unknown> {
  return SKIPPED in spec
}

type FieldPlan =
  | { key: string; codec: Codec<unknown>; create?: undefined }
  | { key: string; codec?: undefined; create: () => unknown }

/** The compiled, ordered layout of a record. */
export type FieldLayout = {
  readonly plan: readonly FieldPlan[]
  readonly minSize: number
}

const INTEGER_KEY = /^(?:0|[1-9]\d*)$/

/** Keys JavaScript moves ahead of all others in an object's key order. */
export function isIndexLikeKey(key: string): boolean {
  return INTEGER_KEY.test(key)
}

/**
 * Checks field names and fixes their order once, at definition time.
 *
 * Integer-like names are refused: object literals move them ahead of every
 * other key, which would silently change the order on the wire.
 */
export function compileFields(typeName: string, fields: Fields): FieldLayout {
  const plan: FieldPlan[] = []
  let minSize = 0

  for (const [key, spec] of Object.entries(fields)) {
    if (isIndexLikeKey(key)) {
      throw CodecDefinitionError.of(typeName, `field "${key}" looks like an array index`)
    }

    if (isSkipped(spec)) {
      plan.push({ key, create: spec.create })
    } else {
      plan.push({ key, codec: spec })
      minSize += spec.minSize
    }
  }

  return { plan, minSize }
}

export async function encodeFields(
  layout: FieldLayout,
  value: object,
  writer: WireWriter,
): Promise<void> {
  for (const field of layout.plan) {
    if (!field.codec) continue

    try {
      await field.codec.encode(Reflect.get(value, field.key), writer)
    } catch (err) {
      throw locate(err, field.key)
    }
  }
}

export async function decodeFields(
  layout: FieldLayout,
  reader: WireReader,
): Promise<Record<string, unknown>> {
  const out: Record<string, unknown> = {}

  for (const field of layout.plan) {
    if (!field.codec) {
      out[field.key] = field.create()
      continue
    }

    try {
      out[field.key] = await field.codec.decode(reader)
    } catch (err) {
      throw locate(err, field.key)
    }
  }

  return out
}
