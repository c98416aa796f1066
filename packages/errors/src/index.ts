export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export {
  FileSystemError,
  type FileSystemErrorContext,
  type FileSystemErrorOptions,
  isFileSystemError,
} from "./core/errors/file-system-error"
export {
  isNotFoundError,
  NotFoundError,
  type NotFoundErrorOptions,
} from "./core/errors/not-found-error"
export { isParseError, ParseError, type ParseErrorOptions } from "./core/errors/parse-error"
export {
  formatPath,
  type IssueLike,
  isValidationError,
  toValidationIssue,
  ValidationError,
  type ValidationErrorContext,
  type ValidationIssue,
} from "./core/errors/validation-error"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
