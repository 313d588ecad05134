export * from "./adapters/config"
export * from "./adapters/memory"
export * from "./adapters/node"
export * from "./core/budget"
export * from "./core/channel"
export * from "./core/codecs"
export * from "./core/config"
export * from "./core/derive"
export * from "./core/errors"
export * from "./core/io"
export * from "./core/wire"
export type * from "./ports/byte-stream"
export type * from "./ports/codec"
export type * from "./ports/config-source"
export type * from "./ports/decode-budget"
export type * from "./ports/error"
