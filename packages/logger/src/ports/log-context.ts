/**
 * Well-known fields bound to configuration log lines.
 */
export type LogContext = {
  service: string
  module: string

  /** Configuration profile name, e.g. "dev" */
  profile: string
  /** Absolute path of the backing file */
  path: string

  section: string
  option: string

  operation: string
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
