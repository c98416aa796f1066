export { FileManager } from "./core/file-manager"
export { isErrnoException, toFsError, toMutationError } from "./core/fs-errors"
export { getPermissionString } from "./core/permissions"
export { normalizeRootPath } from "./core/root-path"
export { type WalkOptions, walkFiles } from "./core/walk"
export type {
  CheckPermissionsOptions,
  CreateDirectoryOptions,
  CreateFileOptions,
  FileListOptions,
  FileManagerOptions,
  Subfolders,
} from "./ports/file-manager-options"
