import { Buffer } from "node:buffer"
import type { InstanceId, InstanceIdSource } from "../../ports/instance-id"
import type { Ordinal } from "../../ports/ordinal-counter"
import { defaultInstanceId } from "../defaults"
import type { VersionTag } from "../version-tag"
import { type SharedTagDecodeReason, SharedTagDecodeError } from "./shared-tag-error"

/** Instance id (8 bytes) followed by ordinal (8 bytes), big-endian. */
export const SHARED_TAG_BYTES = 16

/** Unpadded base64url length of {@link SHARED_TAG_BYTES} bytes. */
export const SHARED_TAG_LENGTH = 22

const BASE64URL = /^[A-Za-z0-9_-]*$/

type Inspection =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; reason: SharedTagDecodeReason; message: string }

function inspect(value: unknown): Inspection {
  if (typeof value !== "string") {
    return { ok: false, reason: "not_a_string", message: `Expected a string, got ${typeof value}` }
  }

  if (value.length !== SHARED_TAG_LENGTH) {
    return {
      ok: false,
      reason: "invalid_length",
      message: `Expected ${SHARED_TAG_LENGTH} characters, got ${value.length}`,
    }
  }

  if (!BASE64URL.test(value)) {
    return {
      ok: false,
      reason: "invalid_alphabet",
      message: "Expected only base64url characters (A-Z a-z 0-9 - _)",
    }
  }

  const bytes = Buffer.from(value, "base64url")

  // The last character carries 4 unused bits; they must be zero.
  if (bytes.length !== SHARED_TAG_BYTES || bytes.toString("base64url") !== value) {
    return { ok: false, reason: "non_canonical", message: "Encoding is not canonical" }
  }

  return { ok: true, bytes }
}

/**
 * A version tag made safe to persist or send across process restarts.
 *
 * Ordinals restart with every process, so an ordinal alone could match a tag
 * written by an earlier lifetime. A shared tag also carries the instance id of
 * the process that minted it, and two shared tags are equal only when both
 * parts match.
 *
 * @example
 * ```ts
 * const stored = SharedTag.from(tag).encode()  // "AAAAAAAAAP8AAAAAAAAAAw"
 *
 * // after a restart
 * SharedTag.decode(stored).equals(SharedTag.from(tag)) // false
 * ```
 */
export class SharedTag {
  private constructor(
    readonly instanceId: InstanceId,
    readonly ordinal: Ordinal,
  ) {}

  static from(tag: VersionTag, instance: InstanceIdSource = defaultInstanceId): SharedTag {
    return new SharedTag(instance.get(), tag.ordinal)
  }

  /**
   * Parse the text form produced by {@link SharedTag.encode}.
   *
   * @throws {SharedTagDecodeError} if `text` is not exactly such an encoding
   */
  static decode(text: unknown): SharedTag {
    const result = inspect(text)

    if (!result.ok) {
      throw new SharedTagDecodeError(result.reason, `Invalid shared tag: ${result.message}`)
    }

    return SharedTag.fromBytes(result.bytes)
  }

  /** @throws {SharedTagDecodeError} if `bytes` is not {@link SHARED_TAG_BYTES} long */
  static fromBytes(bytes: Uint8Array): SharedTag {
    if (bytes.length !== SHARED_TAG_BYTES) {
      throw new SharedTagDecodeError(
        "invalid_length",
        `Invalid shared tag: expected ${SHARED_TAG_BYTES} bytes, got ${bytes.length}`,
      )
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

    return new SharedTag(view.getBigUint64(0), view.getBigUint64(8))
  }

  /** Instance id in the high 64 bits, ordinal in the low 64 bits. */
  get composite(): bigint {
    return (this.instanceId << 64n) | this.ordinal
  }

  /** `false` whenever `other` is absent. */
  equals(other: SharedTag | null | undefined): boolean {
    return other != null && this.instanceId === other.instanceId && this.ordinal === other.ordinal
  }

  toBytes(): Uint8Array {
    const bytes = new Uint8Array(SHARED_TAG_BYTES)
    const view = new DataView(bytes.buffer)

    view.setBigUint64(0, this.instanceId)
    view.setBigUint64(8, this.ordinal)

    return bytes
  }

  encode(): string {
    return Buffer.from(this.toBytes()).toString("base64url")
  }

  toString(): string {
    return this.encode()
  }

  toJSON(): string {
    return this.encode()
  }
}

/** Non-throwing check for the text form of a shared tag. */
export function isEncodedSharedTag(value: unknown): value is string {
  return inspect(value).ok
}
