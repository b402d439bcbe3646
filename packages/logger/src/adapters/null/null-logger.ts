import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/**
 * Discards every entry. Used when a component is built without a logger;
 * bindings are still tracked so `child()` chains behave like a real logger.
 */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly bindings: Readonly<LogContextPatch>

  constructor(bindings: LogContextPatch = {}) {
    this.bindings = Object.freeze({ ...bindings })
  }

  trace(_message: string, _meta?: LogMeta<TContext>): void {}

  debug(_message: string, _meta?: LogMeta<TContext>): void {}

  info(_message: string, _meta?: LogMeta<TContext>): void {}

  warn(_message: string, _meta?: LogMeta<TContext>): void {}

  error(_message: string, _meta?: LogMeta<TContext>): void {}

  fatal(_message: string, _meta?: LogMeta<TContext>): void {}

  child<U extends LogContextPatch>(context: U): NullLogger<TContext & U> {
    return new NullLogger<TContext & U>({ ...this.bindings, ...context })
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(
  bindings: LogContextPatch = {},
): Logger<TContext> {
  return new NullLogger<TContext>(bindings)
}
