import type { WireReader, WireWriter } from "../../ports/codec"
import { toSafeLength } from "../budget"
import { ReadError, WriteError } from "../errors"
import { decodeUint, encodeUint, type UintWidth, uintWidthFor } from "../io"

export type LengthOptions = {
  /**
   * Largest accepted length. Also narrows the prefix to the smallest
   * unsigned width that holds it; without it the prefix is a u64.
   */
  maxLength?: number
}

export function lengthWidth(options: LengthOptions = {}): UintWidth {
  return options.maxLength === undefined ? 8 : uintWidthFor(options.maxLength)
}

export async function writeLength(
  writer: WireWriter,
  length: number,
  forType: string,
  options: LengthOptions = {},
): Promise<void> {
  if (options.maxLength !== undefined && length > options.maxLength) {
    throw WriteError.lengthExceeded(forType, length, options.maxLength)
  }

  await writer.write(encodeUint(length, lengthWidth(options)))
}

export async function readLength(
  reader: WireReader,
  forType: string,
  options: LengthOptions = {},
): Promise<number> {
  const raw = decodeUint(await reader.read(lengthWidth(options)))
  const length = toSafeLength(raw, forType, reader.budget.remaining)

  if (options.maxLength !== undefined && length > options.maxLength) {
    throw ReadError.lengthExceeded(forType, length, options.maxLength)
  }

  return length
}
