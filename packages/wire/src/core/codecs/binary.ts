import type { Codec, WireReader } from "../../ports/codec"
import { tryAllocateBytes } from "../budget"
import { ReadError, WriteError } from "../errors"
import { type LengthOptions, lengthWidth, readLength, writeLength } from "./length-prefix"

const encoder = new TextEncoder()

// Matched per UTF-16 code unit: no `u` flag.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

async function readPayload(
  reader: WireReader,
  forType: string,
  options: LengthOptions,
): Promise<Uint8Array> {
  const length = await readLength(reader, forType, options)
  const reservation = reader.budget.reserve(length, 1, forType)

  try {
    return await reader.read(length)
  } finally {
    reservation.release()
  }
}

/**
 * UTF-8 text behind a byte-count prefix.
 *
 * A string with a lone surrogate has no UTF-8 form and is refused. A byte
 * order mark is kept as part of the value.
 */
export function text(options: LengthOptions = {}): Codec<string> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

  return {
    name: "text",
    minSize: lengthWidth(options),

    async encode(value, writer) {
      if (typeof value !== "string") {
        throw WriteError.invalidValue("text", `${String(value)} is not a string`)
      }

      const lone = LONE_SURROGATE.exec(value)
      if (lone) {
        throw WriteError.invalidValue("text", `lone surrogate at index ${lone.index}`)
      }

      const payload = encoder.encode(value)

      await writeLength(writer, payload.byteLength, "text", options)
      await writer.write(payload)
    },

    async decode(reader) {
      const payload = await readPayload(reader, "text", options)

      try {
        return decoder.decode(payload)
      } catch (err) {
        throw ReadError.invalidUtf8(payload.byteLength, err)
      }
    },
  }
}

/**
 * Raw bytes behind a length prefix. Decoded values never share memory
 * with the source.
 */
export function bytes(options: LengthOptions = {}): Codec<Uint8Array> {
  return {
    name: "bytes",
    minSize: lengthWidth(options),

    async encode(value, writer) {
      if (!(value instanceof Uint8Array)) {
        throw WriteError.invalidValue("bytes", "value is not a Uint8Array")
      }

      await writeLength(writer, value.byteLength, "bytes", options)
      await writer.write(value)
    },

    async decode(reader) {
      const payload = await readPayload(reader, "bytes", options)
      const copy = tryAllocateBytes(payload.byteLength, "bytes")

      copy.set(payload)

      return copy
    },
  }
}
