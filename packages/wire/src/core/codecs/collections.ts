import type { Codec, WireReader, WireWriter } from "../../ports/codec"
import { tryAllocateArray } from "../budget"
import { locate } from "../errors"
import { type LengthOptions, lengthWidth, readLength, writeLength } from "./length-prefix"

export type Compare<T> = (a: T, b: T) => number

async function writeElements<T>(
  writer: WireWriter,
  name: string,
  items: readonly T[],
  writeOne: (item: T) => Promise<void>,
  options: LengthOptions,
): Promise<void> {
  await writeLength(writer, items.length, name, options)

  for (const [index, item] of items.entries()) {
    try {
      await writeOne(item)
    } catch (err) {
      throw locate(err, index)
    }
  }
}

/**
 * Reads a length prefix, reserves `length * unitSize` from the budget and
 * decodes that many elements. Nothing is allocated until the reservation
 * has been granted.
 */
async function readElements<T>(
  reader: WireReader,
  name: string,
  unitSize: number,
  readOne: () => Promise<T>,
  options: LengthOptions,
): Promise<T[]> {
  const length = await readLength(reader, name, options)
  const reservation = reader.budget.reserve(length, unitSize, name)

  try {
    const out: T[] = unitSize > 0 ? tryAllocateArray<T>(length, name) : []

    for (let index = 0; index < length; index++) {
      reservation.shrink()
      try {
        out[index] = await readOne()
      } catch (err) {
        throw locate(err, index)
      }
    }

    return out
  } finally {
    reservation.release()
  }
}

async function writeEntry<K, V>(
  writer: WireWriter,
  key: Codec<K>,
  value: Codec<V>,
  entry: readonly [K, V],
): Promise<void> {
  try {
    await key.encode(entry[0], writer)
  } catch (err) {
    throw locate(err, "key")
  }
  try {
    await value.encode(entry[1], writer)
  } catch (err) {
    throw locate(err, "value")
  }
}

async function readEntry<K, V>(
  reader: WireReader,
  key: Codec<K>,
  value: Codec<V>,
): Promise<[K, V]> {
  let k: K
  try {
    k = await key.decode(reader)
  } catch (err) {
    throw locate(err, "key")
  }
  try {
    return [k, await value.decode(reader)]
  } catch (err) {
    throw locate(err, "value")
  }
}

export function list<T>(codec: Codec<T>, options: LengthOptions = {}): Codec<T[]> {
  const name = `list<${codec.name}>`

  return {
    name,
    minSize: lengthWidth(options),
    encode: (value, writer) =>
      writeElements(writer, name, value, (item) => codec.encode(item, writer), options),
    decode: (reader) =>
      readElements(reader, name, codec.minSize, () => codec.decode(reader), options),
  }
}

/**
 * Elements in iteration order. Duplicates on the wire collapse into one.
 */
export function set<T>(codec: Codec<T>, options: LengthOptions = {}): Codec<Set<T>> {
  const name = `set<${codec.name}>`

  return {
    name,
    minSize: lengthWidth(options),
    encode: (value, writer) =>
      writeElements(writer, name, [...value], (item) => codec.encode(item, writer), options),
    decode: async (reader) =>
      new Set(await readElements(reader, name, codec.minSize, () => codec.decode(reader), options)),
  }
}

/**
 * Key then value for each entry, in iteration order. When a key repeats on
 * the wire the last entry wins.
 */
export function map<K, V>(
  key: Codec<K>,
  value: Codec<V>,
  options: LengthOptions = {},
): Codec<Map<K, V>> {
  const name = `map<${key.name}, ${value.name}>`

  return {
    name,
    minSize: lengthWidth(options),
    encode: (entries, writer) =>
      writeElements(writer, name, [...entries], (entry) => writeEntry(writer, key, value, entry), options),
    decode: async (reader) =>
      new Map(
        await readElements(
          reader,
          name,
          key.minSize + value.minSize,
          () => readEntry(reader, key, value),
          options,
        ),
      ),
  }
}

/**
 * A set written and rebuilt in `compare` order, so equal sets always
 * produce the same bytes.
 */
export function sortedSet<T>(
  codec: Codec<T>,
  compare: Compare<T>,
  options: LengthOptions = {},
): Codec<Set<T>> {
  const name = `sortedSet<${codec.name}>`

  return {
    name,
    minSize: lengthWidth(options),
    encode: (value, writer) =>
      writeElements(
        writer,
        name,
        [...value].sort(compare),
        (item) => codec.encode(item, writer),
        options,
      ),
    decode: async (reader) => {
      const items = await readElements(reader, name, codec.minSize, () => codec.decode(reader), options)

      return new Set(items.sort(compare))
    },
  }
}

export function sortedMap<K, V>(
  key: Codec<K>,
  value: Codec<V>,
  compare: Compare<K>,
  options: LengthOptions = {},
): Codec<Map<K, V>> {
  const name = `sortedMap<${key.name}, ${value.name}>`
  const byKey = (a: readonly [K, V], b: readonly [K, V]) => compare(a[0], b[0])

  return {
    name,
    minSize: lengthWidth(options),
    encode: (entries, writer) =>
      writeElements(
        writer,
        name,
        [...entries].sort(byKey),
        (entry) => writeEntry(writer, key, value, entry),
        options,
      ),
    decode: async (reader) => {
      const entries = await readElements(
        reader,
        name,
        key.minSize + value.minSize,
        () => readEntry(reader, key, value),
        options,
      )

      // Collapse repeated keys first (last wins), then order by key.
      return new Map([...new Map(entries)].sort(byKey))
    },
  }
}
