import { type Ordinal, type OrdinalCounter, ZERO_ORDINAL } from "../ports/ordinal-counter"
import { defaultCounter } from "./defaults"

const pinned = (ordinal: Ordinal): OrdinalCounter => ({
  issue: () => ordinal,
  peek: () => ordinal,
})

/**
 * A totally ordered marker of "when" a value last changed.
 *
 * Keep a tag next to each value you derive things from, and next to each
 * derived value keep the combined tag of its inputs at the time it was
 * computed. When `combine` of the inputs no longer equals that tag, recompute.
 *
 * @example
 * ```ts
 * class Totals {
 *   private tag = VersionTag.zero()
 *   sum = 0
 *
 *   update(a: Tracked<number>, b: Tracked<number>) {
 *     const actual = combine([a.tag, b.tag])
 *     if (!actual.equals(this.tag)) {
 *       this.sum = a.value + b.value
 *       this.tag = actual
 *     }
 *   }
 * }
 * ```
 *
 * @remarks
 * Tags are objects, so assignment shares them. Anything that holds on to a tag
 * as "the version I saw" should keep a `clone()`; `combine` already returns a
 * fresh object.
 */
export class VersionTag {
  private value: Ordinal

  /** Same as {@link VersionTag.fresh}. */
  constructor(counter: OrdinalCounter = defaultCounter) {
    this.value = counter.issue()
  }

  /**
   * A tag newer than every tag drawn from `counter` before this call, and
   * newer than the zero tag.
   */
  static fresh(counter: OrdinalCounter = defaultCounter): VersionTag {
    return new VersionTag(counter)
  }

  /** The "never computed" tag. Older than every issued tag. */
  static zero(): VersionTag {
    return new VersionTag(pinned(ZERO_ORDINAL))
  }

  static compare(a: VersionTag, b: VersionTag): -1 | 0 | 1 {
    return a.compare(b)
  }

  get ordinal(): Ordinal {
    return this.value
  }

  /**
   * Signal that the tagged value changed: draws a new ordinal into this tag.
   *
   * Use the counter the tag was minted from; mixing counters voids the
   * ordering guarantees.
   */
  invalidate(counter: OrdinalCounter = defaultCounter): void {
    this.value = counter.issue()
  }

  isZero(): boolean {
    return this.value === ZERO_ORDINAL
  }

  compare(other: VersionTag): -1 | 0 | 1 {
    if (this.value < other.value) return -1
    if (this.value > other.value) return 1
    return 0
  }

  equals(other: VersionTag | null | undefined): boolean {
    return other != null && this.value === other.value
  }

  isBefore(other: VersionTag): boolean {
    return this.value < other.value
  }

  isAfter(other: VersionTag): boolean {
    return this.value > other.value
  }

  clone(): VersionTag {
    return new VersionTag(pinned(this.value))
  }

  toString(): string {
    return this.value.toString()
  }

  toJSON(): string {
    return this.toString()
  }
}
