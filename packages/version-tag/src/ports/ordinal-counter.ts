/**
 * Position of a tag in the issuance order, an unsigned 64-bit integer.
 *
 * Ordinal 0 belongs to the zero tag and is never issued by a counter.
 */
export type Ordinal = bigint

export const ZERO_ORDINAL: Ordinal = 0n
export const MAX_ORDINAL: Ordinal = 0xffff_ffff_ffff_ffffn

/**
 * Source of unique, strictly increasing ordinals.
 *
 * @remarks
 * No two callers may ever receive the same ordinal, including callers on other
 * threads sharing the counter's memory. Running past {@link MAX_ORDINAL} is
 * not handled.
 */
export interface OrdinalCounter {
  /** Consume and return the next ordinal. */
  issue(): Ordinal

  /** The ordinal the next `issue()` returns, without consuming it. */
  peek(): Ordinal
}

export type CounterOptions = {
  /**
   * First ordinal handed out. Must be between 1 and {@link MAX_ORDINAL}.
   * @default 1n
   */
  start?: Ordinal
}
