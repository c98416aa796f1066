import type { Logger } from "@fieldkit/logger"

/**
 * Options for creating a FileManager.
 */
export type FileManagerOptions = {
  /**
   * Base directory every operation path is resolved against.
   *
   * - `~` and `~/...` expand to the home directory
   * - absolute paths are used as given
   * - other relative paths are joined onto the home directory
   *
   * @example "~/captures", "/var/lib/app", "projects/site"
   */
  rootPath: string

  /**
   * Home directory used to expand `rootPath`.
   *
   * @default os.homedir()
   */
  homeDir?: string

  /** @default a NullLogger */
  logger?: Logger
}

/**
 * Nested folder layout created below a new directory.
 *
 * @example
 * ```ts
 * { images: ["raw", "thumbs"], logs: null, archive: { "2024": "q1" } }
 * ```
 */
export type Subfolders = string | string[] | { [name: string]: Subfolders | null }

export type CreateDirectoryOptions = {
  /** Remove an existing directory (and its contents) first. */
  overwrite?: boolean

  /**
   * Mode for newly created directories. Subject to the process umask.
   *
   * @default 0o755
   */
  mode?: number

  /**
   * Also bring an existing tree at the path to `mode` before creating.
   *
   * @default false
   */
  enforceMode?: boolean

  subfolders?: Subfolders
}

export type CreateFileOptions = {
  /** Directory, relative to the root, the files are created in. */
  subFolder?: string
}

export type FileListOptions = {
  /**
   * Keep only names ending with this extension. The leading dot is
   * optional: "jpg" and ".jpg" are the same filter.
   */
  extension?: string

  /** Descend into subdirectories. @default false */
  recursive?: boolean

  /**
   * Prefix each entry with the full path of the listed directory instead of
   * returning it relative to that directory.
   *
   * @default false
   */
  includeDir?: boolean
}

export type CheckPermissionsOptions = {
  /** Follow symbolic links instead of skipping them. @default false */
  followSymlinks?: boolean
}
