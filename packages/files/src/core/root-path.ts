import os from "node:os"
import path from "node:path"
import { ValidationError } from "@fieldkit/errors"

export function normalizeRootPath(rootPath: string, homeDir: string = os.homedir()): string {
  if (rootPath.trim() === "") {
    throw new ValidationError([
      { path: "rootPath", code: "custom", message: "Root path must not be empty" },
    ])
  }

  if (rootPath.startsWith("~")) {
    return path.join(homeDir, rootPath.slice(1))
  }

  if (path.isAbsolute(rootPath)) {
    return path.normalize(rootPath)
  }

  return path.join(homeDir, rootPath)
}
