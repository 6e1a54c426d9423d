import { type ConfigSource, EnvSource, loadConfig, ObjectSource } from "@vtag/config"
import { parseInstanceId } from "../instance/instance-id"
import { type TagEnv, tagEnvSchema } from "./schema"
import type { TagConfig } from "./tag-config"

export const TAG_ENV_PREFIX = "VTAG_"

export function mapEnvToConfig(env: TagEnv): TagConfig {
  return {
    name: env.RUNTIME_NAME,
    sharedMemory: env.SHARED_MEMORY,
    counter: {
      start: env.COUNTER_START,
    },
    instance: {
      ...(env.INSTANCE_ID !== undefined && { id: parseInstanceId(env.INSTANCE_ID) }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

export type LoadTagConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** Unprefixed keys applied over the environment, e.g. `{ COUNTER_START: 100n }`. */
  overrides?: Record<string, unknown>
}

/** Reads `VTAG_*` variables, then `overrides`, and validates the result. */
export async function loadTagConfig(options: LoadTagConfigOptions = {}): Promise<TagConfig> {
  const sources: ConfigSource[] = [
    new EnvSource({ prefix: TAG_ENV_PREFIX, env: options.env ?? process.env }),
  ]

  if (options.overrides) {
    sources.push(new ObjectSource(options.overrides))
  }

  return mapEnvToConfig(await loadConfig({ schema: tagEnvSchema, sources }))
}
