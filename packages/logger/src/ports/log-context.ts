export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the codec involved, e.g. `list(varint,int8)` */
  codec: string
  offset: number
  length: number
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
