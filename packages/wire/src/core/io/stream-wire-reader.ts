import type { ByteSource } from "../../ports/byte-stream"
import type { WireReader } from "../../ports/codec"
import type { DecodeBudget } from "../../ports/decode-budget"
import { ReadError } from "../errors"
import { raceAbort } from "./abort"

export const DEFAULT_MAX_DEPTH = 64

export type StreamWireReaderOptions = {
  budget: DecodeBudget
  maxDepth?: number
  signal?: AbortSignal | undefined
}

export class StreamWireReader implements WireReader {
  readonly budget: DecodeBudget
  private readonly maxDepth: number
  private readonly signal: AbortSignal | undefined
  private depth = 0
  private offset = 0

  constructor(
    private readonly source: ByteSource,
    options: StreamWireReaderOptions,
  ) {
    this.budget = options.budget
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
    this.signal = options.signal
  }

  get bytesRead(): number {
    return this.offset
  }

  async read(length: number): Promise<Uint8Array> {
    if (this.signal?.aborted) throw ReadError.aborted(this.signal.reason)
    if (length === 0) return new Uint8Array(0)

    let chunk: Uint8Array

    try {
      chunk = await raceAbort(this.source.readExact(length), this.signal, ReadError.aborted)
    } catch (err) {
      throw err instanceof ReadError ? err : ReadError.io(err)
    }

    if (chunk.byteLength !== length) {
      throw ReadError.endOfStream(length, chunk.byteLength)
    }

    this.offset += length
    this.budget.consume(length)

    return chunk
  }

  async descend<T>(forType: string, fn: () => Promise<T>): Promise<T> {
    if (this.depth >= this.maxDepth) throw ReadError.depthExceeded(forType, this.maxDepth)

    this.depth++
    try {
      return await fn()
    } finally {
      this.depth--
    }
  }
}
