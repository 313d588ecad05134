import type { PathSegment } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "./base-error"
import { formatPath } from "./format-path"

export type WireErrorOptions<C extends string> = BaseErrorOptions<C> &
  Readonly<{
    path?: readonly PathSegment[]
  }>

/**
 * Base for codec failures that know where in the value they happened.
 *
 * `path` lists segments outermost first; `context.path` holds the same
 * location rendered as `Order.items[2].name`.
 */
export abstract class WireError<C extends string> extends BaseError<C> {
  readonly path: readonly PathSegment[]

  constructor(message: string, options: WireErrorOptions<C>) {
    const path = options.path ?? []

    super(message, {
      ...options,
      context: {
        ...options.context,
        ...(path.length > 0 && { path: formatPath(path) }),
      },
    })

    this.path = path
  }

  /** Returns a copy of this error located one level further out. */
  abstract within(segment: PathSegment): WireError<C>

  protected rebuild(segment: PathSegment): WireErrorOptions<C> {
    return {
      code: this.code,
      context: this.context,
      cause: this.cause,
      isOperational: this.isOperational,
      path: [segment, ...this.path],
    }
  }
}
