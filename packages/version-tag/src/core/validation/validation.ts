import { createError } from "@vtag/errors"
import { MAX_ORDINAL, type Ordinal } from "../../ports/ordinal-counter"

export const U64_BYTES = BigUint64Array.BYTES_PER_ELEMENT

export function assertCounterStart(start: Ordinal): void {
  if (start < 1n || start > MAX_ORDINAL) {
    throw createError(
      "invalid_counter_start",
      `Counter start must be between 1 and ${MAX_ORDINAL}, got: ${start}`,
      { start: start.toString() },
    )
  }
}

export function assertU64Slot(buffer: SharedArrayBuffer, name: string): void {
  if (buffer.byteLength < U64_BYTES) {
    throw createError(
      "invalid_shared_buffer",
      `${name} needs a SharedArrayBuffer of at least ${U64_BYTES} bytes, got: ${buffer.byteLength}`,
      { name, byteLength: buffer.byteLength },
    )
  }
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= MAX_ORDINAL
}
