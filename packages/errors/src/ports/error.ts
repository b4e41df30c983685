export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Carries structured data (line numbers, keys, field names) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for diagnostics */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected failure caused by the input (true) or a
   * programmer error / invariant violation (false).
   *
   * @remarks
   * - Operational errors (`true`): malformed config line, unknown schema type, missing file.
   * - Non-operational errors (`false`): anything that escaped as a plain `Error`.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and machine-readable output.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
