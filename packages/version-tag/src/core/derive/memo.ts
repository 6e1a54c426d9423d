import { type Logger, NullLogger } from "@vtag/logger"
import type { Versioned } from "../../ports/versioned"
import { combine } from "../combine"
import { VersionTag } from "../version-tag"

type MemoState<T> = { status: "empty" } | { status: "ready"; value: T; tag: VersionTag }

export type MemoOptions = {
  /** Shows up as `memo` in log entries. @default "memo" */
  name?: string
  logger?: Logger
}

function* tagsOf(deps: Iterable<VersionTag | Versioned>): Generator<VersionTag> {
  for (const dep of deps) {
    yield dep instanceof VersionTag ? dep : dep.tag
  }
}

/**
 * Caches the result of `compute` and runs it again only when the combined tag
 * of the dependencies passed to `get` moves.
 *
 * @example
 * ```ts
 * const price = new Tracked(10)
 * const quantity = new Tracked(3)
 * const total = new Memo(() => price.value * quantity.value, { name: "total" })
 *
 * total.get([price, quantity]) // computes 30
 * total.get([price, quantity]) // cached
 * quantity.set(4)
 * total.get([price, quantity]) // computes 40
 * ```
 */
export class Memo<T> {
  readonly name: string
  private state: MemoState<T> = { status: "empty" }
  private readonly logger: Logger

  constructor(
    private readonly compute: () => T,
    options: MemoOptions = {},
  ) {
    this.name = options.name ?? "memo"
    this.logger = (options.logger ?? new NullLogger()).child({ memo: this.name })
  }

  /**
   * Returns the cached value, recomputing first if nothing is cached or the
   * dependencies changed. If `compute` throws, the cache is left as it was.
   */
  get(deps: Iterable<VersionTag | Versioned>): T {
    const actual = combine(tagsOf(deps))

    if (this.state.status === "ready" && this.state.tag.equals(actual)) {
      return this.state.value
    }

    const previous = this.state.status === "ready" ? this.state.tag : VersionTag.zero()
    const value = this.compute()

    this.state = { status: "ready", value, tag: actual }
    this.logger.debug("recomputed", { from: previous.toString(), to: actual.toString() })

    return value
  }

  get isComputed(): boolean {
    return this.state.status === "ready"
  }

  /** Tag the cached value was computed under; zero before the first `get`. */
  get version(): VersionTag {
    return this.state.status === "ready" ? this.state.tag.clone() : VersionTag.zero()
  }

  /** Forget the cached value; the next `get` recomputes. */
  reset(): void {
    this.state = { status: "empty" }
  }
}
