/** Random unsigned 64-bit value identifying one process lifetime. */
export type InstanceId = bigint

/**
 * Provides the instance identifier salted into shared tags.
 *
 * Every call on the same source returns the same value; concurrent first
 * calls agree on one value.
 */
export interface InstanceIdSource {
  get(): InstanceId
}
