export * from "./env-source"
export * from "./object-source"
