import { PassThrough } from "node:stream"
import { describeByteSourceContract } from "../../../ports/__tests__/byte-source.contract"
import { NodeDuplexStream } from "../node-duplex-stream"
import { NodeStreamSource } from "../node-stream-source"

describeByteSourceContract({
  name: "NodeStreamSource",
  make: async (bytes) => {
    const stream = new PassThrough()
    stream.end(Buffer.from(bytes))

    return { source: new NodeStreamSource(stream) }
  },
})

describeByteSourceContract({
  name: "NodeDuplexStream",
  make: async (bytes) => {
    const duplex = new NodeDuplexStream(new PassThrough())

    await duplex.writeAll(bytes)
    await duplex.end()

    return { source: duplex }
  },
})
