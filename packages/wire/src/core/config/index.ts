export * from "./config-error"
export * from "./load-wire-config"
export * from "./loaded-config"
export * from "./wire-config-schema"
