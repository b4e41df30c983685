export type LogContext = {
  command: string
  source: string
  schema: string

  entries: number
  fields: number
  durationMs: number

  sources: string[]
  unknownKeys: string[]
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
