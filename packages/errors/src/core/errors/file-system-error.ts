import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type FileSystemErrorContext = ErrorContext & {
  path: string
  errno?: string
  syscall?: string
}

export type FileSystemErrorOptions = Readonly<{
  context: FileSystemErrorContext
  cause?: unknown
}>

/**
 * An OS-level filesystem failure: name collision, permission denied, a file
 * where a directory was expected. The errno exception is kept as `cause`.
 */
export class FileSystemError extends BaseError<"file_system_error"> {
  declare readonly context: Readonly<FileSystemErrorContext>

  constructor(message: string, options: FileSystemErrorOptions) {
    super(message, { code: "file_system_error", ...options })
  }

  static fromErrno(err: NodeJS.ErrnoException, path: string): FileSystemError {
    return new FileSystemError(err.message, {
      cause: err,
      context: {
        path,
        ...(err.code !== undefined && { errno: err.code }),
        ...(err.syscall !== undefined && { syscall: err.syscall }),
      },
    })
  }
}

export function isFileSystemError(err: unknown): err is FileSystemError {
  return err instanceof FileSystemError
}
