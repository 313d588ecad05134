export * from "./binary"
export * from "./collections"
export * from "./fixed"
export * from "./floats"
export * from "./integers"
export * from "./lazy"
export * from "./length-prefix"
export * from "./non-zero"
export * from "./option"
export * from "./result"
export * from "./scalars"
export * from "./tuple"
export * from "./via"
