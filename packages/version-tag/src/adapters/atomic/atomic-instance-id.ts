import { type Logger, NullLogger } from "@vtag/logger"
import {
  drawInstanceId,
  formatInstanceId,
  UNSET_INSTANCE_ID,
} from "../../core/instance/instance-id"
import { assertU64Slot, U64_BYTES } from "../../core/validation/validation"
import type { InstanceId, InstanceIdSource } from "../../ports/instance-id"
import type { RandomSource } from "../../ports/random-source"
import { cryptoRandom } from "../random/crypto-random"

const SLOT = 0

export type AtomicInstanceIdOptions = {
  /** Attach to a slot created elsewhere, e.g. on the main thread. */
  buffer?: SharedArrayBuffer
  /** @default cryptoRandom */
  random?: RandomSource
  logger?: Logger
}

/**
 * Instance id kept in a `SharedArrayBuffer` slot.
 *
 * The slot starts at 0. The first caller to swap a random value in with
 * `Atomics.compareExchange` wins; everyone else, on any thread sharing the
 * buffer, reads the winner's value. Nobody blocks.
 */
export class AtomicInstanceId implements InstanceIdSource {
  readonly buffer: SharedArrayBuffer
  private readonly view: BigUint64Array
  private readonly random: RandomSource
  private readonly logger: Logger

  constructor(options: AtomicInstanceIdOptions = {}) {
    if (options.buffer) assertU64Slot(options.buffer, "AtomicInstanceId")

    this.buffer = options.buffer ?? new SharedArrayBuffer(U64_BYTES)
    this.view = new BigUint64Array(this.buffer, 0, 1)
    this.random = options.random ?? cryptoRandom
    this.logger = options.logger ?? new NullLogger()
  }

  get(): InstanceId {
    const current = Atomics.load(this.view, SLOT)
    if (current !== UNSET_INSTANCE_ID) return current

    const candidate = drawInstanceId(this.random)
    const previous = Atomics.compareExchange(this.view, SLOT, UNSET_INSTANCE_ID, candidate)

    if (previous !== UNSET_INSTANCE_ID) return previous

    this.logger.debug("instance id initialized", { instanceId: formatInstanceId(candidate) })

    return candidate
  }
}
