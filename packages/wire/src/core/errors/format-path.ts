import type { PathSegment } from "../../ports/error"

export function formatPath(path: readonly PathSegment[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${part}` : part
  }
  return out
}
