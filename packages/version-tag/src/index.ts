export { AtomicCounter, type AtomicCounterOptions } from "./adapters/atomic/atomic-counter"
export {
  AtomicInstanceId,
  type AtomicInstanceIdOptions,
} from "./adapters/atomic/atomic-instance-id"
export { fixedInstanceId } from "./adapters/fixed/fixed-instance-id"
export { LazyInstanceId, type LazyInstanceIdDeps } from "./adapters/memory/lazy-instance-id"
export { MemoryCounter } from "./adapters/memory/memory-counter"
export { cryptoRandom } from "./adapters/random/crypto-random"
export { combine } from "./core/combine"
export {
  type LoadTagConfigOptions,
  loadTagConfig,
  mapEnvToConfig,
  TAG_ENV_PREFIX,
} from "./core/config/load-tag-config"
export { type TagEnv, tagEnvSchema } from "./core/config/schema"
export type { TagConfig } from "./core/config/tag-config"
export {
  attachDefaults,
  defaultCounter,
  defaultInstanceId,
  type SharedDefaults,
  sharedDefaults,
} from "./core/defaults"
export { Memo, type MemoOptions } from "./core/derive/memo"
export { Tracked } from "./core/derive/tracked"
export { formatInstanceId, parseInstanceId } from "./core/instance/instance-id"
export {
  type CreateTagRuntimeDeps,
  createTagRuntime,
} from "./core/runtime/create-tag-runtime"
export { defaultRuntime, fresh, share, zero } from "./core/runtime/default-runtime"
export {
  TagRuntime,
  type TagRuntimeDeps,
  type TagRuntimeOptions,
} from "./core/runtime/tag-runtime"
export {
  isEncodedSharedTag,
  SHARED_TAG_BYTES,
  SHARED_TAG_LENGTH,
  SharedTag,
} from "./core/shared/shared-tag"
export {
  type SharedTagDecodeReason,
  SharedTagDecodeError,
} from "./core/shared/shared-tag-error"
export { VersionTag } from "./core/version-tag"
export type { InstanceId, InstanceIdSource } from "./ports/instance-id"
export {
  type CounterOptions,
  MAX_ORDINAL,
  type Ordinal,
  type OrdinalCounter,
  ZERO_ORDINAL,
} from "./ports/ordinal-counter"
export type { RandomSource } from "./ports/random-source"
export type { Versioned } from "./ports/versioned"
