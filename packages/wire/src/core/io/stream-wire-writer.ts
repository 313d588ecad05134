import type { ByteSink } from "../../ports/byte-stream"
import type { WireWriter } from "../../ports/codec"
import { WriteError } from "../errors"
import { raceAbort } from "./abort"
import { DEFAULT_MAX_DEPTH } from "./stream-wire-reader"

export type StreamWireWriterOptions = {
  maxDepth?: number
  signal?: AbortSignal | undefined
}

export class StreamWireWriter implements WireWriter {
  private readonly maxDepth: number
  private readonly signal: AbortSignal | undefined
  private depth = 0
  private offset = 0

  constructor(
    private readonly sink: ByteSink,
    options: StreamWireWriterOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
    this.signal = options.signal
  }

  get bytesWritten(): number {
    return this.offset
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.signal?.aborted) throw WriteError.aborted(this.signal.reason)
    if (bytes.byteLength === 0) return

    try {
      await raceAbort(this.sink.writeAll(bytes), this.signal, WriteError.aborted)
    } catch (err) {
      throw err instanceof WriteError ? err : WriteError.io(err)
    }

    this.offset += bytes.byteLength
  }

  async descend<T>(forType: string, fn: () => Promise<T>): Promise<T> {
    if (this.depth >= this.maxDepth) throw WriteError.depthExceeded(forType, this.maxDepth)

    this.depth++
    try {
      return await fn()
    } finally {
      this.depth--
    }
  }
}
