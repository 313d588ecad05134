import { createPinoLogger, type Logger } from "@wirepact/logger"
import type { ByteDuplex } from "../../ports/byte-stream"
import type { Codec } from "../../ports/codec"
import type { WireConfig } from "../config"
import { toDecodeOptions } from "../config"
import { ReadError } from "../errors"
import { type DecodeOptions, decodeCounted, type EncodeOptions, toBytes } from "../wire"
import { SerialQueue } from "./serial-queue"

export type WireChannelOptions = {
  stream: ByteDuplex
  /** Label carried in every log line as `channel`. */
  name: string
  logger?: Logger
  config?: WireConfig
  /** Overrides for every receive; the config supplies the rest. */
  decode?: DecodeOptions
}

/**
 * Sends and receives typed values over one duplex stream.
 *
 * Each direction runs its operations one at a time. A value is encoded in
 * full before the first byte is written, so a value that cannot be encoded
 * leaves the stream untouched. A failed receive leaves the read side at an
 * unknown offset; every later receive fails with `io_error`.
 */
export class WireChannel {
  private readonly sends = new SerialQueue()
  private readonly receives = new SerialQueue()
  private readonly logger: Logger
  private readonly decodeOptions: DecodeOptions
  private failure: unknown

  constructor(private readonly options: WireChannelOptions) {
    const base =
      options.logger ??
      createPinoLogger(
        {},
        {
          name: "wire",
          ...(options.config && {
            level: options.config.value.WIRE_LOG_LEVEL,
            prettify: options.config.value.WIRE_LOG_PRETTY,
          }),
        },
      )

    this.logger = base.child({ channel: options.name })
    this.decodeOptions = {
      ...(options.config && toDecodeOptions(options.config.value)),
      ...options.decode,
    }
  }

  get name(): string {
    return this.options.name
  }

  get desynchronized(): boolean {
    return this.failure !== undefined
  }

  send<T>(codec: Codec<T>, value: T, options: EncodeOptions = {}): Promise<number> {
    return this.sends.run(async () => {
      const bytes = await toBytes(codec, value, {
        maxDepth: this.decodeOptions.maxDepth,
        ...options,
      })

      await this.options.stream.writeAll(bytes)

      this.logger.debug("sent value", {
        codec: codec.name,
        direction: "send",
        bytes: bytes.byteLength,
      })

      return bytes.byteLength
    })
  }

  receive<T>(codec: Codec<T>, options: DecodeOptions = {}): Promise<T> {
    return this.receives.run(async () => {
      if (this.failure !== undefined) {
        throw ReadError.io(new Error(`channel ${this.name} is out of sync`, { cause: this.failure }))
      }

      const started = performance.now()

      try {
        const { value, bytesRead } = await decodeCounted(codec, this.options.stream, {
          ...this.decodeOptions,
          ...options,
        })

        this.logger.debug("received value", {
          codec: codec.name,
          direction: "receive",
          bytes: bytesRead,
          durationMs: performance.now() - started,
        })

        return value
      } catch (err) {
        this.failure = err
        this.logger.warn("receive failed", { codec: codec.name, direction: "receive", err })
        throw err
      }
    })
  }

  /** Ends the write side once queued sends have finished. */
  close(): Promise<void> {
    return this.sends.run(() => this.options.stream.end())
  }
}

export function createWireChannel(options: WireChannelOptions): WireChannel {
  return new WireChannel(options)
}
