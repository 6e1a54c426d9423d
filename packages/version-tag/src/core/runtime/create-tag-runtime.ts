import { type Logger, PinoLogger } from "@vtag/logger"
import { AtomicCounter } from "../../adapters/atomic/atomic-counter"
import { AtomicInstanceId } from "../../adapters/atomic/atomic-instance-id"
import { fixedInstanceId } from "../../adapters/fixed/fixed-instance-id"
import { LazyInstanceId } from "../../adapters/memory/lazy-instance-id"
import { MemoryCounter } from "../../adapters/memory/memory-counter"
import type { InstanceIdSource } from "../../ports/instance-id"
import type { OrdinalCounter } from "../../ports/ordinal-counter"
import type { RandomSource } from "../../ports/random-source"
import type { TagConfig } from "../config/tag-config"
import { formatInstanceId } from "../instance/instance-id"
import { TagRuntime } from "./tag-runtime"

export type CreateTagRuntimeDeps = {
  /** Replaces the pino logger built from `config.logging`. */
  logger?: Logger
  random?: RandomSource
}

export function createTagRuntime(
  config: TagConfig,
  deps: CreateTagRuntimeDeps = {},
): TagRuntime {
  const logger =
    deps.logger ??
    new PinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const counter: OrdinalCounter = config.sharedMemory
    ? new AtomicCounter({ start: config.counter.start })
    : new MemoryCounter({ start: config.counter.start })

  const random = deps.random ? { random: deps.random } : {}
  const pinned = config.instance.id

  let instance: InstanceIdSource
  if (pinned !== undefined) {
    instance = fixedInstanceId(pinned)
  } else if (config.sharedMemory) {
    instance = new AtomicInstanceId({ ...random, logger })
  } else {
    instance = new LazyInstanceId({ ...random, logger })
  }

  logger.debug("tag runtime created", {
    runtime: config.name,
    sharedMemory: config.sharedMemory,
    counterStart: config.counter.start.toString(),
    ...(pinned !== undefined && { instanceId: formatInstanceId(pinned) }),
  })

  return new TagRuntime({ counter, instance, logger }, { name: config.name })
}
