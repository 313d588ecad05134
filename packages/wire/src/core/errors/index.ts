export * from "./base-error"
export * from "./codec-definition-error"
export * from "./format-path"
export * from "./is-wire-error"
export * from "./read-error"
export * from "./wire-error"
export * from "./write-error"
