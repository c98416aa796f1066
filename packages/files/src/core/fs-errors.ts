import {
  type AppError,
  FileSystemError,
  isAppError,
  NotFoundError,
} from "@fieldkit/errors"

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string"
}

/**
 * Map a failed filesystem query on `path` to the error taxonomy.
 * ENOENT becomes NotFoundError; every other errno becomes FileSystemError.
 */
export function toFsError(err: unknown, path: string): AppError {
  if (isErrnoException(err) && err.code === "ENOENT") {
    return new NotFoundError(`No such file or directory: ${path}`, {
      cause: err,
      context: { path },
    })
  }

  return toMutationError(err, path)
}

/**
 * Map a failed create, delete, rename or move on `path`. Every OS failure,
 * a missing target included, becomes FileSystemError with the errno code.
 */
export function toMutationError(err: unknown, path: string): AppError {
  if (isAppError(err)) return err
  if (isErrnoException(err)) return FileSystemError.fromErrno(err, path)

  return new FileSystemError(`Filesystem operation failed on ${path}`, {
    cause: err,
    context: { path },
  })
}
