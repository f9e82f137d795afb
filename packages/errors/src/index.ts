export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { describeErrorChain, errorChain } from "./core/utils/error-chain"
export { toAppError } from "./core/utils/to-app-error"
export type { AppError, ErrorCode, ErrorContext } from "./ports/error"
