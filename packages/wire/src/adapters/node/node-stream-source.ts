import type { Readable } from "node:stream"
import type { ByteSource } from "../../ports/byte-stream"
import { ReadError } from "../../core/errors"

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength)
  }
  throw ReadError.io(new TypeError("readable must be in binary mode"))
}

/**
 * Reads from a Node `Readable` (a socket, a pipe, a file stream) through
 * `read(n)`, so bytes beyond the request stay in the stream's own buffer.
 */
export class NodeStreamSource implements ByteSource {
  private failure: unknown

  constructor(private readonly readable: Readable) {
    readable.on("error", (err) => {
      this.failure = err
    })
  }

  async readExact(length: number): Promise<Uint8Array> {
    if (length === 0) return new Uint8Array(0)

    for (;;) {
      if (this.failure !== undefined) throw ReadError.io(this.failure)

      const chunk: unknown = this.readable.read(length)

      if (chunk !== null) {
        const bytes = toBytes(chunk)
        // After the stream ends, read(n) hands back whatever is left.
        if (bytes.byteLength < length) throw ReadError.endOfStream(length, bytes.byteLength)
        return bytes
      }

      if (this.readable.readableEnded || this.readable.destroyed) {
        throw ReadError.endOfStream(length, 0)
      }

      await this.settle()
    }
  }

  remaining(): number | undefined {
    return undefined
  }

  private settle(): Promise<void> {
    const readable = this.readable

    return new Promise<void>((resolve) => {
      const done = () => {
        readable.off("readable", done)
        readable.off("end", done)
        readable.off("error", done)
        readable.off("close", done)
        resolve()
      }

      readable.on("readable", done)
      readable.on("end", done)
      readable.on("error", done)
      readable.on("close", done)
    })
  }
}
