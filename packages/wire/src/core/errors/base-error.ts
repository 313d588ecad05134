import type { ErrorContext, SerializedError } from "../../ports/error"

export type BaseErrorOptions<C extends string = string> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  /** Default: true. False marks a mistake in the calling code. */
  isOperational?: boolean
}>

/**
 * Root of every error the engine throws on purpose. `context` is frozen so
 * relocated copies can share it.
 */
export class BaseError<C extends string = string> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
  /** Causes below this depth are cut off. Default: 8 */
  maxCauseDepth?: number
}>

function serializeOne(err: unknown, includeStack: boolean): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "ThrownValue",
      code: "unknown",
      message: typeof err === "string" ? err : "a value that is not an Error was thrown",
      context: { value: err },
      isOperational: false,
    }
  }

  const known = err instanceof BaseError

  return {
    name: err.name,
    code: known ? err.code : "unknown",
    message: err.message,
    context: known ? { ...err.context } : {},
    isOperational: known && err.isOperational,
    ...(includeStack && err.stack && { stack: err.stack }),
  }
}

/**
 * Turns any thrown value and its `cause` chain into plain JSON. A cause
 * that loops back to an error already written ends the chain.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  const includeStack = options.includeStack ?? false
  const maxCauseDepth = options.maxCauseDepth ?? 8

  const chain: unknown[] = [err]
  const seen = new Set<unknown>([err])
  let current = err

  while (current instanceof Error && current.cause !== undefined && chain.length <= maxCauseDepth) {
    current = current.cause
    if (seen.has(current)) break
    seen.add(current)
    chain.push(current)
  }

  return chain.reduceRight<SerializedError | undefined>((inner, link) => {
    const outer = serializeOne(link, includeStack)
    return inner ? { ...outer, cause: inner } : outer
  }, undefined) ?? serializeOne(err, includeStack)
}
