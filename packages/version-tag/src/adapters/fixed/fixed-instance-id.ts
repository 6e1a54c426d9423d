import { createError } from "@vtag/errors"
import { UNSET_INSTANCE_ID } from "../../core/instance/instance-id"
import { isU64 } from "../../core/validation/validation"
import type { InstanceId, InstanceIdSource } from "../../ports/instance-id"

/**
 * A pinned instance id, for simulating distinct process lifetimes or for
 * deployments that assign one explicitly. Must be a non-zero 64-bit value.
 */
export const fixedInstanceId = (id: InstanceId): InstanceIdSource => {
  if (id === UNSET_INSTANCE_ID || !isU64(id)) {
    throw createError(
      "invalid_instance_id",
      `Instance id must be a non-zero 64-bit value, got: ${id}`,
      { value: id.toString() },
    )
  }

  return { get: () => id }
}
