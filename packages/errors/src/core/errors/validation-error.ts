import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

/** The subset of a zod issue this module reads. */
export type IssueLike = {
  readonly path: ReadonlyArray<PropertyKey>
  readonly message: string
  readonly code?: string
}

export type ValidationIssue = {
  path: string
  code: string
  message: string
}

export type ValidationErrorContext = ErrorContext & {
  issues: ValidationIssue[]
}

export function formatPath(path: ReadonlyArray<PropertyKey>): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  declare readonly context: Readonly<ValidationErrorContext>

  constructor(issues: ValidationIssue[], options: Readonly<{ cause?: unknown }> = {}) {
    super(summarize(issues), {
      code: "validation_error",
      context: { issues },
      ...options,
    })
  }

  get issues(): readonly ValidationIssue[] {
    return this.context.issues
  }

  /**
   * Build from zod issues. `prefix` is prepended to every issue path, so the
   * issues of a `camera` section read as `camera.index`.
   */
  static fromZodIssues(
    issues: readonly IssueLike[],
    prefix: ReadonlyArray<PropertyKey> = [],
  ): ValidationError {
    return new ValidationError(issues.map((i) => toValidationIssue(i, prefix)))
  }
}

export function toValidationIssue(
  issue: IssueLike,
  prefix: ReadonlyArray<PropertyKey> = [],
): ValidationIssue {
  return {
    path: formatPath([...prefix, ...issue.path]),
    code: issue.code ?? "custom",
    message: issue.message,
  }
}

function summarize(issues: readonly ValidationIssue[]): string {
  const [first] = issues
  if (!first) return "Invalid input"

  const head = first.path ? `${first.path}: ${first.message}` : first.message
  if (issues.length === 1) return head

  return `${head} (and ${issues.length - 1} more)`
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError && Array.isArray(err.context.issues)
}
