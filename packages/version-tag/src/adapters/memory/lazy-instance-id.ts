import { type Logger, NullLogger } from "@vtag/logger"
import { drawInstanceId, formatInstanceId } from "../../core/instance/instance-id"
import type { InstanceId, InstanceIdSource } from "../../ports/instance-id"
import type { RandomSource } from "../../ports/random-source"
import { cryptoRandom } from "../random/crypto-random"

export type LazyInstanceIdDeps = {
  /** @default cryptoRandom */
  random?: RandomSource
  logger?: Logger
}

/** Instance id drawn on first use and kept for the life of this object. */
export class LazyInstanceId implements InstanceIdSource {
  private value: InstanceId | undefined
  private readonly random: RandomSource
  private readonly logger: Logger

  constructor(deps: LazyInstanceIdDeps = {}) {
    this.random = deps.random ?? cryptoRandom
    this.logger = deps.logger ?? new NullLogger()
  }

  get(): InstanceId {
    if (this.value === undefined) {
      this.value = drawInstanceId(this.random)
      this.logger.debug("instance id initialized", {
        instanceId: formatInstanceId(this.value),
      })
    }

    return this.value
  }
}
