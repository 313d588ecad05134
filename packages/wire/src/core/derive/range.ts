import type { Codec } from "../../ports/codec"
import { struct } from "./struct"

export type Range<T> = { start: T; end: T }

/** `start` then `end`, both with `bound`. Nothing checks their order. */
export function range<T>(bound: Codec<T>): Codec<Range<T>> {
  return struct(`range<${bound.name}>`, { start: bound, end: bound })
}
