import type { DecodeBudget } from "./decode-budget"

/**
 * Cursor handed to every codec during a decode call tree.
 */
export interface WireReader {
  readonly bytesRead: number
  readonly budget: DecodeBudget
  read(length: number): Promise<Uint8Array>
  /** Runs `fn` one nesting level deeper; fails with `depth_exceeded` past the limit. */
  descend<T>(forType: string, fn: () => Promise<T>): Promise<T>
}

/**
 * Cursor handed to every codec during an encode call tree.
 */
export interface WireWriter {
  readonly bytesWritten: number
  write(bytes: Uint8Array): Promise<void>
  descend<T>(forType: string, fn: () => Promise<T>): Promise<T>
}

/**
 * The paired encode/decode capability a type needs to take part in the
 * wire format.
 *
 * @typeParam T - The in-memory value.
 */
export interface Codec<T> {
  /** Type name used in error paths. */
  readonly name: string

  /** Lower bound on the encoded size in bytes, used for budget reservations. */
  readonly minSize: number

  encode(value: T, writer: WireWriter): Promise<void>

  decode(reader: WireReader): Promise<T>
}

export type Infer<C> = C extends Codec<infer T> ? T : never
