export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { errorChain, findInChain } from "./core/utils/error-chain"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
