import { BaseError, type ErrorContext } from "@vtag/errors"

export type SharedTagDecodeReason =
  | "not_a_string"
  | "invalid_length"
  | "invalid_alphabet"
  | "non_canonical"

export class SharedTagDecodeError extends BaseError<"invalid_shared_tag"> {
  readonly reason: SharedTagDecodeReason

  constructor(reason: SharedTagDecodeReason, message: string, context: ErrorContext = {}) {
    super(message, { code: "invalid_shared_tag", context: { ...context, reason } })

    this.reason = reason
  }
}
