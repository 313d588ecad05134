import type { Duplex } from "node:stream"
import type { ByteDuplex } from "../../ports/byte-stream"
import { NodeStreamSink } from "./node-stream-sink"
import { NodeStreamSource } from "./node-stream-source"

/**
 * Both directions of a Node `Duplex`, typically a `net.Socket`.
 */
export class NodeDuplexStream implements ByteDuplex {
  private readonly source: NodeStreamSource
  private readonly sink: NodeStreamSink

  constructor(duplex: Duplex) {
    this.source = new NodeStreamSource(duplex)
    this.sink = new NodeStreamSink(duplex)
  }

  readExact(length: number): Promise<Uint8Array> {
    return this.source.readExact(length)
  }

  remaining(): number | undefined {
    return undefined
  }

  writeAll(bytes: Uint8Array): Promise<void> {
    return this.sink.writeAll(bytes)
  }

  end(): Promise<void> {
    return this.sink.end()
  }
}
