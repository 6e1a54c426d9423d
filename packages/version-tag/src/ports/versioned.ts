import type { VersionTag } from "../core/version-tag"

/** Anything that carries the tag of its current value. */
export interface Versioned {
  readonly tag: VersionTag
}
