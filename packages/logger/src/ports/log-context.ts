export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the configuration source a log line concerns */
  source: string
  /** Configuration key a log line concerns */
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Partial overlay applied to an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
