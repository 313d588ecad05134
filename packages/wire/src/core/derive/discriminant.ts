import type { WireReader, WireWriter } from "../../ports/codec"
import { CodecDefinitionError } from "../errors"
import { decodeUint, encodeUint } from "../io"

export type DiscriminantWidth = 1 | 2 | 4

export const MAX_DISCRIMINANT = 0xffffffff

export type DiscriminantTable = {
  readonly width: DiscriminantWidth
  readonly byName: ReadonlyMap<string, number>
  readonly byValue: ReadonlyMap<number, string>
}

/**
 * Assigns each name its 0-based declaration index unless `overrides` pins
 * it to another value. The wire width follows the largest value in use.
 */
export function resolveDiscriminants(
  typeName: string,
  names: readonly string[],
  overrides: Readonly<Partial<Record<string, number>>> = {},
): DiscriminantTable {
  const byName = new Map<string, number>()
  const byValue = new Map<number, string>()

  for (const key of Object.keys(overrides)) {
    if (!names.includes(key)) {
      throw CodecDefinitionError.of(typeName, `discriminant given for unknown variant "${key}"`)
    }
  }

  for (const [index, variant] of names.entries()) {
    const value = overrides[variant] ?? index

    if (!Number.isInteger(value) || value < 0 || value > MAX_DISCRIMINANT) {
      throw CodecDefinitionError.of(
        typeName,
        `discriminant ${value} for "${variant}" must be an integer in 0..${MAX_DISCRIMINANT}`,
      )
    }

    const taken = byValue.get(value)
    if (taken !== undefined) {
      throw CodecDefinitionError.of(
        typeName,
        `variants "${taken}" and "${variant}" share discriminant ${value}`,
      )
    }

    byName.set(variant, value)
    byValue.set(value, variant)
  }

  const max = Math.max(0, ...byValue.keys())

  return { width: discriminantWidth(max), byName, byValue }
}

export function discriminantWidth(max: number): DiscriminantWidth {
  if (max <= 0xff) return 1
  if (max <= 0xffff) return 2
  return 4
}

export async function writeDiscriminant(
  writer: WireWriter,
  table: DiscriminantTable,
  value: number,
): Promise<void> {
  await writer.write(encodeUint(value, table.width))
}

export async function readDiscriminant(
  reader: WireReader,
  table: DiscriminantTable,
): Promise<number> {
  return Number(decodeUint(await reader.read(table.width)))
}
