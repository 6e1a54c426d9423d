import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (_message: string, _meta?: LogMeta): void => {}

/** Drops every entry. What the tag code logs to unless handed a logger. */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  readonly trace = discard
  readonly debug = discard
  readonly info = discard
  readonly warn = discard
  readonly error = discard
  readonly fatal = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}
