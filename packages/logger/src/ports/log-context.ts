/**
 * Fields a logger can be scoped with through `child()`.
 *
 * `runtime` names the tag runtime emitting the entry; `memo` names the cached
 * derivation when the entry concerns one.
 */
export type LogContext = {
  service: string
  module: string
  env: string
  runtime: string
  memo: string
}

/** Per-call fields. `err` goes through pino's error serializer. */
export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> & {
  err?: unknown
} & Record<string, unknown>

/** Partial overlay merged into the current context by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
