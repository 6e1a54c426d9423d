/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion, merging and validation happen in `loadConfig`.
 */
export interface ConfigSource {
  /** Shown in `invalid_config` errors, e.g. "env:VTAG_" */
  readonly name: string

  /**
   * Resolve to a fresh object on every call. A key mapped to `undefined`
   * counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
