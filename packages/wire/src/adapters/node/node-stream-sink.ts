import type { Writable } from "node:stream"
import type { ByteSink } from "../../ports/byte-stream"
import { WriteError } from "../../core/errors"

/**
 * Writes to a Node `Writable`, waiting for `'drain'` whenever the stream
 * reports backpressure. A stream that closes instead of draining fails the
 * write with `io_error`.
 */
export class NodeStreamSink implements ByteSink {
  private failure: unknown

  constructor(private readonly writable: Writable) {
    writable.on("error", (err) => {
      this.failure = err
    })
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    if (this.failure !== undefined) throw WriteError.io(this.failure)
    if (this.writable.destroyed || this.writable.writableEnded) {
      throw WriteError.io(new Error("stream is closed"))
    }

    const writable = this.writable

    await new Promise<void>((resolve, reject) => {
      if (writable.write(bytes)) {
        resolve()
        return
      }

      const settle = (err?: Error) => {
        writable.off("drain", onDrain)
        writable.off("error", onError)
        writable.off("close", onClose)
        if (err) reject(WriteError.io(err))
        else resolve()
      }
      const onDrain = () => settle()
      const onError = (err: Error) => settle(err)
      const onClose = () => settle(new Error("stream closed before it drained"))

      writable.on("drain", onDrain)
      writable.on("error", onError)
      writable.on("close", onClose)
    })
  }

  async end(): Promise<void> {
    if (this.writable.writableEnded) return

    const writable = this.writable

    await new Promise<void>((resolve) => {
      writable.end(() => resolve())
    })
  }
}
