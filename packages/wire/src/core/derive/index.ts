export * from "./discriminant"
export * from "./duration"
export * from "./enumeration"
export * from "./fields"
export * from "./flags"
export * from "./range"
export * from "./struct"
export * from "./tagged-union"
