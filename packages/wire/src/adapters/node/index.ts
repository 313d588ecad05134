export * from "./node-duplex-stream"
export * from "./node-stream-sink"
export * from "./node-stream-source"
