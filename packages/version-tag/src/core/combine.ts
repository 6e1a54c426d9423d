import { VersionTag } from "./version-tag"

/**
 * Reduce the tags of a value's inputs to the single tag the value depends on:
 * the newest input wins, and no input at all yields the zero tag.
 *
 * The result is a new object, so invalidating an input afterwards does not
 * change it.
 */
export function combine(tags: Iterable<VersionTag>): VersionTag {
  let newest: VersionTag | undefined

  for (const tag of tags) {
    if (!newest || tag.isAfter(newest)) newest = tag
  }

  return newest ? newest.clone() : VersionTag.zero()
}
