export type LogContext = {
  /** Component emitting the entry, e.g. "options" */
  module: string

  /** Absolute path of the option file being processed */
  file: string

  /** Human-readable origin label, e.g. "options file /etc/app.json" */
  source: string

  /** Logical operation, e.g. "load" or "write" */
  operation: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
