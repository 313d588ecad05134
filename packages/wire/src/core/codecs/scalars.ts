import type { Codec } from "../../ports/codec"
import { ReadError, WriteError } from "../errors"

export const bool: Codec<boolean> = {
  name: "bool",
  minSize: 1,

  async encode(value, writer) {
    if (typeof value !== "boolean") {
      throw WriteError.invalidValue("bool", `${String(value)} is not a boolean`)
    }
    await writer.write(Uint8Array.of(value ? 1 : 0))
  },

  async decode(reader) {
    const [byte = 0] = await reader.read(1)

    if (byte === 0) return false
    if (byte === 1) return true
    throw ReadError.invalidBool(byte)
  },
}

/** Zero bytes on the wire. */
export const unit: Codec<null> = {
  name: "unit",
  minSize: 0,
  async encode() {},
  async decode() {
    return null
  },
}

/** A type with no values: nothing can be written and nothing can be read. */
export const never: Codec<never> = {
  name: "never",
  minSize: 0,

  async encode() {
    throw WriteError.invalidValue("never", "the type has no values")
  },

  async decode() {
    throw ReadError.never("never")
  },
}
