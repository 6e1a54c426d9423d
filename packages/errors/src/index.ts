export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { type CreateErrorOptions, createError } from "./core/utils/create-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
