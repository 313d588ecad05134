export * from "./memory-byte-sink"
export * from "./memory-byte-source"
export * from "./memory-pipe"
