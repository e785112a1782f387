export { BaseError, type BaseErrorOptions, serializeError, type SerializeOptions } from "./core/base-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
