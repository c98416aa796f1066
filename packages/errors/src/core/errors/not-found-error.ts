import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type NotFoundErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/** A file, directory or configuration section that does not exist. */
export class NotFoundError extends BaseError<"not_found"> {
  constructor(message: string, options: NotFoundErrorOptions = {}) {
    super(message, { code: "not_found", ...options })
  }
}

export function isNotFoundError(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError
}
