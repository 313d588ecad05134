import type { ByteSource } from "../../ports/byte-stream"
import { ReadError } from "../../core/errors"

export type MemoryByteSourceOptions = {
  /**
   * Whether `remaining()` reports the unread length. Turn it off to make
   * the source look like an open-ended transport. Default: true
   */
  reportRemaining?: boolean
}

export class MemoryByteSource implements ByteSource {
  private offset = 0
  private readonly reportRemaining: boolean

  constructor(
    private readonly bytes: Uint8Array,
    options: MemoryByteSourceOptions = {},
  ) {
    this.reportRemaining = options.reportRemaining ?? true
  }

  get position(): number {
    return this.offset
  }

  async readExact(length: number): Promise<Uint8Array> {
    const available = this.bytes.byteLength - this.offset

    if (length > available) {
      this.offset = this.bytes.byteLength
      throw ReadError.endOfStream(length, available)
    }

    const chunk = this.bytes.subarray(this.offset, this.offset + length)
    this.offset += length

    return chunk
  }

  remaining(): number | undefined {
    return this.reportRemaining ? this.bytes.byteLength - this.offset : undefined
  }
}
