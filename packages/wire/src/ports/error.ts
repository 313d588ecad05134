/** Structured metadata carried by every engine error. */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * One step in the location of a failure inside a value: a field or
 * variant name, or an element index.
 */
export type PathSegment = string | number

/** JSON-safe shape of an error and its causes, for logs and replies. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
