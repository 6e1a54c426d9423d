import type { ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

export type CreateErrorOptions = Omit<BaseErrorOptions, "code" | "context">

/**
 * Build a {@link BaseError} from a code, a message and the values that explain
 * it. Context comes third because nearly every call site has some.
 *
 * @example
 * ```ts
 * throw createError("invalid_counter_start", "Counter must start at 1 or above", {
 *   start: "0",
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  context: ErrorContext = {},
  options: CreateErrorOptions = {},
): BaseError<C> {
  return new BaseError(message, { ...options, code, context })
}
