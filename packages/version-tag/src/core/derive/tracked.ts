import type { OrdinalCounter } from "../../ports/ordinal-counter"
import type { Versioned } from "../../ports/versioned"
import { defaultCounter } from "../defaults"
import { VersionTag } from "../version-tag"

/** A value that re-tags itself whenever it is replaced. */
export class Tracked<T> implements Versioned {
  private current: T
  private readonly version: VersionTag

  constructor(
    value: T,
    private readonly counter: OrdinalCounter = defaultCounter,
  ) {
    this.current = value
    this.version = VersionTag.fresh(counter)
  }

  get value(): T {
    return this.current
  }

  /** A copy; invalidations after the read do not show up in it. */
  get tag(): VersionTag {
    return this.version.clone()
  }

  set(value: T): void {
    this.current = value
    this.version.invalidate(this.counter)
  }

  update(fn: (current: T) => T): void {
    this.set(fn(this.current))
  }

  /** Mark the value changed without replacing it, e.g. after mutating it in place. */
  touch(): void {
    this.version.invalidate(this.counter)
  }
}
