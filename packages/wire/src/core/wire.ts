import { MemoryByteSink } from "../adapters/memory/memory-byte-sink"
import { MemoryByteSource } from "../adapters/memory/memory-byte-source"
import type { ByteSink, ByteSource } from "../ports/byte-stream"
import type { Codec } from "../ports/codec"
import { AllocationGovernor } from "./budget"
import { isReadErrorCode, locate, ReadError } from "./errors"
import { StreamWireReader, StreamWireWriter } from "./io"

export const WIRE_FORMAT_VERSION = 1

export type EncodeOptions = {
  /** Nesting limit for `lazy` codecs. Default: 64 */
  maxDepth?: number
  signal?: AbortSignal
}

export type DecodeOptions = EncodeOptions & {
  /** Upper bound on what one decode may allocate. Default: 16 MiB */
  maxBytes?: number
}

export type TryDecodeResult<T> =
  | { kind: "complete"; value: T; bytesRead: number }
  | { kind: "incomplete" }

export type Decoded<T> = { value: T; bytesRead: number }

/**
 * Like `decode`, also reporting how many bytes the value took.
 */
export async function decodeCounted<T>(
  codec: Codec<T>,
  source: ByteSource,
  options: DecodeOptions = {},
): Promise<Decoded<T>> {
  const reader = new StreamWireReader(source, {
    budget: new AllocationGovernor({
      maxBytes: options.maxBytes,
      available: source.remaining?.(),
    }),
    maxDepth: options.maxDepth,
    signal: options.signal,
  })

  try {
    const value = await codec.decode(reader)
    return { value, bytesRead: reader.bytesRead }
  } catch (err) {
    throw locate(err, codec.name)
  }
}

/**
 * Writes `value` to `sink` and resolves with the number of bytes written.
 */
export async function encode<T>(
  codec: Codec<T>,
  value: T,
  sink: ByteSink,
  options: EncodeOptions = {},
): Promise<number> {
  const writer = new StreamWireWriter(sink, options)

  try {
    await codec.encode(value, writer)
  } catch (err) {
    throw locate(err, codec.name)
  }

  return writer.bytesWritten
}

/**
 * Reads exactly one value from `source`, consuming only its bytes.
 */
export async function decode<T>(
  codec: Codec<T>,
  source: ByteSource,
  options: DecodeOptions = {},
): Promise<T> {
  const { value } = await decodeCounted(codec, source, options)
  return value
}

export async function toBytes<T>(
  codec: Codec<T>,
  value: T,
  options: EncodeOptions = {},
): Promise<Uint8Array> {
  const sink = new MemoryByteSink()

  await encode(codec, value, sink, options)

  return sink.toBytes()
}

/**
 * Decodes a complete buffer. Bytes left after the value are an error.
 */
export async function fromBytes<T>(
  codec: Codec<T>,
  bytes: Uint8Array,
  options: DecodeOptions = {},
): Promise<T> {
  const source = new MemoryByteSource(bytes)
  const { value } = await decodeCounted(codec, source, options)
  const left = source.remaining() ?? 0

  if (left > 0) throw ReadError.trailingBytes(left).within(codec.name)

  return value
}

/**
 * Decodes the value at the start of `bytes` if it is all there.
 *
 * A buffer that ends early yields `{ kind: "incomplete" }`; every other
 * failure is thrown. The budget is not tied to the buffer length, so a
 * value whose bytes have not all arrived is reported as incomplete.
 */
export async function tryDecode<T>(
  codec: Codec<T>,
  bytes: Uint8Array,
  options: DecodeOptions = {},
): Promise<TryDecodeResult<T>> {
  const source = new MemoryByteSource(bytes, { reportRemaining: false })

  try {
    const { value, bytesRead } = await decodeCounted(codec, source, options)
    return { kind: "complete", value, bytesRead }
  } catch (err) {
    if (isReadErrorCode(err, "end_of_stream")) return { kind: "incomplete" }
    throw err
  }
}
