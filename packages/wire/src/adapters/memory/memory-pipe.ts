import type { ByteDuplex } from "../../ports/byte-stream"
import { ReadError, WriteError } from "../../core/errors"

/**
 * One direction of an in-process pipe. Readers wait until the writer has
 * supplied enough bytes or has ended.
 */
class PipeBuffer {
  private chunks: Uint8Array[] = []
  private buffered = 0
  private ended = false
  private wake: (() => void) | undefined

  push(bytes: Uint8Array): void {
    if (this.ended) throw WriteError.io(new Error("pipe is closed"))

    this.chunks.push(bytes.slice())
    this.buffered += bytes.byteLength
    this.notify()
  }

  end(): void {
    this.ended = true
    this.notify()
  }

  async take(length: number): Promise<Uint8Array> {
    while (this.buffered < length) {
      if (this.ended) throw ReadError.endOfStream(length, this.buffered)
      await new Promise<void>((resolve) => {
        this.wake = resolve
      })
    }

    const out = new Uint8Array(length)
    let filled = 0

    while (filled < length) {
      const head = this.chunks[0]
      if (!head) break

      const used = Math.min(head.byteLength, length - filled)
      out.set(head.subarray(0, used), filled)
      filled += used

      if (used === head.byteLength) this.chunks.shift()
      else this.chunks[0] = head.subarray(used)
    }

    this.buffered -= length

    return out
  }

  private notify(): void {
    const wake = this.wake
    this.wake = undefined
    wake?.()
  }
}

export class MemoryDuplex implements ByteDuplex {
  constructor(
    private readonly incoming: PipeBuffer,
    private readonly outgoing: PipeBuffer,
  ) {}

  readExact(length: number): Promise<Uint8Array> {
    return this.incoming.take(length)
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    this.outgoing.push(bytes)
  }

  async end(): Promise<void> {
    this.outgoing.end()
  }
}

/**
 * Two connected in-process endpoints: bytes written to one are read from
 * the other.
 */
export function createMemoryPipe(): [MemoryDuplex, MemoryDuplex] {
  const ab = new PipeBuffer()
  const ba = new PipeBuffer()

  return [new MemoryDuplex(ba, ab), new MemoryDuplex(ab, ba)]
}
