import type { Codec } from "../../ports/codec"
import { WriteError } from "../errors"

export type FixedLayout<T> = {
  name: string
  size: number
  /** Returns a reason when `value` cannot be written. */
  check?: (value: T) => string | undefined
  write: (view: DataView, value: T) => void
  read: (view: DataView) => T
}

/**
 * Builds a codec for a value that always occupies `size` bytes.
 */
export function fixed<T>(layout: FixedLayout<T>): Codec<T> {
  return {
    name: layout.name,
    minSize: layout.size,

    async encode(value, writer) {
      const problem = layout.check?.(value)
      if (problem !== undefined) throw WriteError.invalidValue(layout.name, problem)

      const bytes = new Uint8Array(layout.size)
      layout.write(new DataView(bytes.buffer), value)

      await writer.write(bytes)
    },

    async decode(reader) {
      const bytes = await reader.read(layout.size)

      return layout.read(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength))
    },
  }
}
