export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export { errorChain } from "./core/utils/error-chain"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  SerializedError,
  SerializeOptions,
} from "./ports/error"
