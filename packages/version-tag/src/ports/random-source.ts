/**
 * Source of randomness for instance identifiers.
 *
 * @remarks
 * `nextU64()` MUST return a uniformly distributed integer in [0, 2^64).
 */
export interface RandomSource {
  nextU64(): bigint
}
