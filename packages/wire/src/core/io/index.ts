export * from "./abort"
export * from "./stream-wire-reader"
export * from "./stream-wire-writer"
export * from "./uint"
