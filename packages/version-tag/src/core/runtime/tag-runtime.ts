import { type Logger, NullLogger } from "@vtag/logger"
import type { InstanceIdSource } from "../../ports/instance-id"
import type { OrdinalCounter } from "../../ports/ordinal-counter"
import { combine } from "../combine"
import { Memo } from "../derive/memo"
import { Tracked } from "../derive/tracked"
import { SharedTag } from "../shared/shared-tag"
import { VersionTag } from "../version-tag"

export type TagRuntimeDeps = {
  counter: OrdinalCounter
  instance: InstanceIdSource
  logger?: Logger
}

export type TagRuntimeOptions = {
  /** Shows up as `runtime` in log entries. @default "default" */
  name?: string
}

/**
 * Mints and shares tags through one counter and one instance id.
 *
 * Tags from different runtimes are not ordered against each other; give every
 * part of the program that compares tags the same runtime.
 */
export class TagRuntime {
  readonly name: string
  private readonly logger: Logger

  constructor(
    private readonly deps: TagRuntimeDeps,
    options: TagRuntimeOptions = {},
  ) {
    this.name = options.name ?? "default"
    this.logger = (deps.logger ?? new NullLogger()).child({ runtime: this.name })
  }

  fresh(): VersionTag {
    return VersionTag.fresh(this.deps.counter)
  }

  zero(): VersionTag {
    return VersionTag.zero()
  }

  invalidate(tag: VersionTag): void {
    tag.invalidate(this.deps.counter)
  }

  combine(tags: Iterable<VersionTag>): VersionTag {
    return combine(tags)
  }

  share(tag: VersionTag): SharedTag {
    return SharedTag.from(tag, this.deps.instance)
  }

  /** Whether `shared` was minted by this runtime's process instance. */
  isLocal(shared: SharedTag): boolean {
    return shared.instanceId === this.deps.instance.get()
  }

  /**
   * {@link SharedTag.decode}, logging rejected input at `warn` before
   * rethrowing.
   */
  decode(text: unknown): SharedTag {
    try {
      return SharedTag.decode(text)
    } catch (err) {
      this.logger.warn("rejected shared tag", { err })
      throw err
    }
  }

  track<T>(value: T): Tracked<T> {
    return new Tracked(value, this.deps.counter)
  }

  memo<T>(compute: () => T, name?: string): Memo<T> {
    return new Memo(compute, { logger: this.logger, ...(name !== undefined && { name }) })
  }
}
