import type { ByteSink } from "../../ports/byte-stream"

export class MemoryByteSink implements ByteSink {
  private readonly chunks: Uint8Array[] = []
  private length = 0

  get size(): number {
    return this.length
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    this.chunks.push(bytes.slice())
    this.length += bytes.byteLength
  }

  /** Everything written so far, as one contiguous copy. */
  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length)
    let offset = 0

    for (const chunk of this.chunks) {
      out.set(chunk, offset)
      offset += chunk.byteLength
    }

    return out
  }
}
