import type { Codec } from "../../ports/codec"

/**
 * Defers to the codec returned by `resolve`, one nesting level deeper.
 *
 * Recursive types must go through `lazy`; the reader and writer fail with
 * `depth_exceeded` once `maxDepth` levels are open. `name` is taken up
 * front because the target usually does not exist yet when this runs.
 *
 * @example
 * ```ts
 * type Tree = { value: number; children: Tree[] }
 *
 * const Tree: Codec<Tree> = struct("Tree", {
 *   value: u32,
 *   children: list(lazy("Tree", () => Tree)),
 * })
 * ```
 */
export function lazy<T>(name: string, resolve: () => Codec<T>): Codec<T> {
  let resolved: Codec<T> | undefined

  const target = (): Codec<T> => {
    resolved ??= resolve()
    return resolved
  }

  return {
    name,
    minSize: 0,
    encode: (value, writer) => writer.descend(name, () => target().encode(value, writer)),
    decode: (reader) => reader.descend(name, () => target().decode(reader)),
  }
}
