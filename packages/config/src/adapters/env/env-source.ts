import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Read only variables starting with this, and drop it from their names. */
  prefix?: string
  /** Read at every `load()`. @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * Environment variables as a config source.
 *
 * Empty values count as unset, so `VTAG_INSTANCE_ID=` falls back to the
 * schema default instead of failing validation.
 */
export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.name = options.prefix ? `env:${options.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const prefix = this.options.prefix ?? ""
    const env = this.options.env ?? process.env

    return Object.fromEntries(
      Object.entries(env).flatMap(([key, value]) =>
        key.startsWith(prefix) && value ? [[key.slice(prefix.length), value] as const] : [],
      ),
    )
  }
}
