export type LogContext = {
  service: string
  module: string
  env: string

  /** Discovery source a log line concerns, e.g. "file" or "azure". */
  source: string

  /** Cloud resource or bound service a log line concerns. */
  resource: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a logger's context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
