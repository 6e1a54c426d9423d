export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { ConfigSource } from "./ports/source"
