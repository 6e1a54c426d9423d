import { createError } from "@vtag/errors"
import type { InstanceId } from "../../ports/instance-id"
import type { RandomSource } from "../../ports/random-source"

/** Marks an instance id slot that nobody has filled yet. */
export const UNSET_INSTANCE_ID: InstanceId = 0n

const HEX_INSTANCE_ID = /^[0-9a-f]{16}$/i

/** Draws a random non-zero 64-bit instance id. */
export function drawInstanceId(random: RandomSource): InstanceId {
  let id = UNSET_INSTANCE_ID

  while (id === UNSET_INSTANCE_ID) {
    id = BigInt.asUintN(64, random.nextU64())
  }

  return id
}

/** Fixed-width lowercase hex, the form used in logs and configuration. */
export function formatInstanceId(id: InstanceId): string {
  return id.toString(16).padStart(16, "0")
}

export function parseInstanceId(text: string): InstanceId {
  if (!HEX_INSTANCE_ID.test(text)) {
    throw createError("invalid_instance_id", `Instance id must be 16 hex digits, got: ${text}`, {
      value: text,
    })
  }

  return BigInt(`0x${text}`)
}
