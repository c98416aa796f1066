import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type ParseErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/** Content that could not be decoded, e.g. malformed JSON. */
export class ParseError extends BaseError<"parse_error"> {
  constructor(message: string, options: ParseErrorOptions = {}) {
    super(message, { code: "parse_error", ...options })
  }
}

export function isParseError(err: unknown): err is ParseError {
  return err instanceof ParseError
}
