/**
 * Read side of a byte-oriented transport.
 *
 * Implementations suspend until the request can be satisfied and keep no
 * buffer beyond what the in-flight call needs.
 */
export interface ByteSource {
  /**
   * Resolves with exactly `length` bytes.
   *
   * Rejects with a `ReadError`:
   * - `end_of_stream` when the transport closes first
   * - `io_error` when the transport fails
   */
  readExact(length: number): Promise<Uint8Array>

  /**
   * Bytes known to still be readable, or `undefined` when the transport
   * cannot tell (sockets, pipes).
   */
  remaining?(): number | undefined
}

/**
 * Write side of a byte-oriented transport.
 */
export interface ByteSink {
  /** Resolves once every byte has been accepted. Rejects with a `WriteError`. */
  writeAll(bytes: Uint8Array): Promise<void>
}

export interface ByteDuplex extends ByteSource, ByteSink {
  /** Signals that no more bytes will be written. */
  end(): Promise<void>
}
