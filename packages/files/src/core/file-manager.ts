import type { Stats } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { type AppError, FileSystemError, NotFoundError } from "@fieldkit/errors"
import { createNullLogger, type Logger } from "@fieldkit/logger"
import type {
  CheckPermissionsOptions,
  CreateDirectoryOptions,
  CreateFileOptions,
  FileListOptions,
  FileManagerOptions,
  Subfolders,
} from "../ports/file-manager-options"
import { toFsError, toMutationError } from "./fs-errors"
import { getPermissionString } from "./permissions"
import { normalizeRootPath } from "./root-path"
import { walkFiles } from "./walk"

const DEFAULT_DIRECTORY_MODE = 0o755

const MUTATIONS: ReadonlySet<string> = new Set([
  "createDirectory",
  "createFile",
  "delete",
  "rename",
  "move",
])

/**
 * Files and directories below a single root path.
 *
 * Every method resolves its path arguments against `rootPath`, so absolute
 * arguments escape the root. Operations run their filesystem calls one after
 * another; none of them is transactional.
 *
 * Listing a missing directory fails with NotFoundError. Mutations fail with
 * FileSystemError for every OS failure, a missing target included
 * (`context.errno` is then `"ENOENT"`).
 *
 * @example
 * ```ts
 * const files = new FileManager({ rootPath: "~/captures" })
 *
 * await files.createDirectory("session-1", { subfolders: ["raw", "thumbs"] })
 * const jpgs = await files.getFilesByExtension("session-1/raw", ".jpg")
 *
 * for await (const file of files.getFilesRecursively("session-1", true)) {
 *   console.log(file) // "raw/0001.jpg"
 * }
 * ```
 */
export class FileManager {
  readonly rootPath: string
  private readonly logger: Logger

  constructor(options: FileManagerOptions) {
    this.rootPath = normalizeRootPath(options.rootPath, options.homeDir)
    this.logger = (options.logger ?? createNullLogger()).child({ module: "files" })
  }

  resolve(target: string): string {
    return path.resolve(this.rootPath, target)
  }

  async createDirectory(name: string, options: CreateDirectoryOptions = {}): Promise<string> {
    const fullPath = this.resolve(name)
    const mode = options.mode ?? DEFAULT_DIRECTORY_MODE

    await this.attempt("createDirectory", fullPath, async () => {
      if (options.overwrite) await this.removeExistingDirectory(fullPath)
      if (options.enforceMode) await this.checkPathPermissions(fullPath, mode)

      await fs.mkdir(fullPath, { recursive: true, mode })
    })

    this.logger.info("Created directory", { path: fullPath })

    if (options.subfolders !== undefined) {
      for (const [child, nested] of subfolderEntries(options.subfolders)) {
        await this.createDirectory(path.join(fullPath, child), {
          mode,
          ...(options.overwrite !== undefined && { overwrite: options.overwrite }),
          ...(nested !== null && { subfolders: nested }),
        })
      }
    }

    return fullPath
  }

  /**
   * Create empty files. Fails on the first path that already exists; files
   * created before it are kept.
   */
  async createFile(paths: string | string[], options: CreateFileOptions = {}): Promise<string[]> {
    const created: string[] = []

    for (const file of typeof paths === "string" ? [paths] : paths) {
      const fullPath = this.resolve(options.subFolder ? path.join(options.subFolder, file) : file)

      await this.attempt("createFile", fullPath, () => fs.writeFile(fullPath, "", { flag: "wx" }))
      this.logger.info("Created file", { path: fullPath })

      created.push(fullPath)
    }

    return created
  }

  /** Remove a file, or a directory with everything below it. */
  async delete(target: string): Promise<void> {
    const fullPath = this.resolve(target)

    await this.attempt("delete", fullPath, () => fs.rm(fullPath, { recursive: true }))
    this.logger.info("Deleted", { path: fullPath })
  }

  /**
   * Rename `oldPath` within its directory: `newName` is resolved against the
   * directory holding `oldPath`, not the root. Refuses to replace an existing
   * entry.
   *
   * @returns the resolved new path
   */
  async rename(oldPath: string, newName: string): Promise<string> {
    const src = this.resolve(oldPath)
    const dst = path.resolve(path.dirname(src), newName)

    await this.relocate("rename", src, dst)

    return dst
  }

  /**
   * Move `src` into the existing directory `dstDir`, keeping its name.
   *
   * @returns the resolved new path
   */
  async move(src: string, dstDir: string): Promise<string> {
    const from = this.resolve(src)
    const dir = this.resolve(dstDir)

    await this.assertDirectory("move", dir)

    const to = path.join(dir, path.basename(from))
    await this.relocate("move", from, to)

    return to
  }

  /**
   * Walk the tree at `target` depth-first and chmod every entry whose
   * permission bits differ from `mode`. A missing target is a no-op.
   *
   * @returns the paths whose mode was changed
   */
  async checkPathPermissions(
    target: string,
    mode: number,
    options: CheckPermissionsOptions = {},
  ): Promise<string[]> {
    const fullPath = this.resolve(target)
    const corrected: string[] = []

    const stat = await this.statOrNull(fullPath, options.followSymlinks ?? false)
    if (!stat) return corrected

    await this.correctPermissions(fullPath, stat, mode, options.followSymlinks ?? false, corrected)

    return corrected
  }

  async getFileList(dir: string, options: FileListOptions = {}): Promise<string[]> {
    const files: string[] = []

    for await (const file of this.listFiles(dir, options)) {
      files.push(file)
    }

    return files
  }

  /** Names of the files directly in `dir` ending with `extension`. */
  getFilesByExtension(dir: string, extension: string): Promise<string[]> {
    return this.getFileList(dir, { extension })
  }

  /**
   * Lazy sequence of the files in `dir`, relative to it; with `recursive`
   * also those in every subdirectory. Each call starts a new traversal.
   */
  getFilesRecursively(dir: string, recursive = false): AsyncGenerator<string, void, undefined> {
    return this.listFiles(dir, { recursive })
  }

  getFilePathsWithDir(dir: string, includeDir = false): Promise<string[]> {
    return this.getFileList(dir, { includeDir })
  }

  getPermissionString(mode: number): string {
    return getPermissionString(mode)
  }

  private async *listFiles(
    dir: string,
    options: FileListOptions,
  ): AsyncGenerator<string, void, undefined> {
    const fullPath = this.resolve(dir)
    const suffix = normalizeExtension(options.extension)

    await this.assertDirectory("listFiles", fullPath)

    const walk = walkFiles(fullPath, { recursive: options.recursive ?? false })

    for await (const file of this.guard("listFiles", fullPath, walk)) {
      if (suffix && !file.endsWith(suffix)) continue

      yield options.includeDir ? path.join(fullPath, file) : file
    }
  }

  private async *guard(
    operation: string,
    target: string,
    source: AsyncIterable<string>,
  ): AsyncGenerator<string, void, undefined> {
    try {
      yield* source
    } catch (err) {
      throw this.fail(operation, target, err)
    }
  }

  private async relocate(operation: string, src: string, dst: string): Promise<void> {
    await this.attempt(operation, src, () => fs.lstat(src))

    if (await this.statOrNull(dst, false)) {
      throw this.fail(
        operation,
        dst,
        new FileSystemError(`Destination already exists: ${dst}`, {
          context: { path: dst, errno: "EEXIST" },
        }),
      )
    }

    await this.attempt(operation, dst, () => fs.rename(src, dst))
    this.logger.info(operation === "move" ? "Moved" : "Renamed", { path: dst, from: src })
  }

  private async removeExistingDirectory(fullPath: string): Promise<void> {
    const stat = await this.statOrNull(fullPath, false)
    if (!stat) return

    if (!stat.isDirectory()) {
      throw new FileSystemError(`Cannot overwrite ${fullPath}: it is not a directory`, {
        context: { path: fullPath, errno: "EEXIST" },
      })
    }

    await fs.rm(fullPath, { recursive: true, force: true })
    this.logger.info("Removed existing directory", { path: fullPath })
  }

  private async correctPermissions(
    current: string,
    stat: Stats,
    mode: number,
    followSymlinks: boolean,
    corrected: string[],
  ): Promise<void> {
    if (stat.isSymbolicLink()) return

    const actual = stat.mode & 0o777

    if (actual !== mode) {
      await this.attempt("checkPathPermissions", current, () => fs.chmod(current, mode))
      corrected.push(current)

      this.logger.info("Corrected permissions", {
        path: current,
        from: getPermissionString(actual),
        to: getPermissionString(mode),
      })
    }

    if (!stat.isDirectory()) return

    const entries = await this.attempt("checkPathPermissions", current, () => fs.readdir(current))

    for (const entry of entries) {
      const child = path.join(current, entry)
      const childStat = await this.attempt("checkPathPermissions", child, () =>
        followSymlinks ? fs.stat(child) : fs.lstat(child),
      )

      if (childStat.isDirectory()) {
        await this.correctPermissions(child, childStat, mode, followSymlinks, corrected)
      }
    }
  }

  private async assertDirectory(operation: string, fullPath: string): Promise<void> {
    const stat = await this.attempt(operation, fullPath, () => fs.stat(fullPath))

    if (!stat.isDirectory()) {
      throw this.fail(
        operation,
        fullPath,
        new FileSystemError(`Not a directory: ${fullPath}`, {
          context: { path: fullPath, errno: "ENOTDIR" },
        }),
      )
    }
  }

  private async statOrNull(fullPath: string, followSymlinks: boolean): Promise<Stats | null> {
    try {
      return followSymlinks ? await fs.stat(fullPath) : await fs.lstat(fullPath)
    } catch (err) {
      const mapped = toFsError(err, fullPath)
      if (mapped instanceof NotFoundError) return null
      throw mapped
    }
  }

  private async attempt<T>(operation: string, target: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw this.fail(operation, target, err)
    }
  }

  private fail(operation: string, target: string, err: unknown): AppError {
    const mapped = MUTATIONS.has(operation) ? toMutationError(err, target) : toFsError(err, target)

    this.logger.error(`${operation} failed`, { operation, path: target, err: mapped })

    return mapped
  }
}

function normalizeExtension(extension: string | undefined): string | undefined {
  if (!extension) return undefined

  return extension.startsWith(".") ? extension : `.${extension}`
}

function subfolderEntries(subfolders: Subfolders): Array<[string, Subfolders | null]> {
  if (typeof subfolders === "string") return [[subfolders, null]]
  if (Array.isArray(subfolders)) return subfolders.map((name): [string, null] => [name, null])

  return Object.entries(subfolders)
}
