import type { Codec } from "../../ports/codec"
import { fixed } from "./fixed"

const checkFloat = (value: number): string | undefined =>
  typeof value === "number" ? undefined : `${String(value)} is not a number`

export const f32: Codec<number> = fixed({
  name: "f32",
  size: 4,
  check: checkFloat,
  write: (view, value) => view.setFloat32(0, value),
  read: (view) => view.getFloat32(0),
})

export const f64: Codec<number> = fixed({
  name: "f64",
  size: 8,
  check: checkFloat,
  write: (view, value) => view.setFloat64(0, value),
  read: (view) => view.getFloat64(0),
})
