import fs from "node:fs/promises"
import path from "node:path"

export type WalkOptions = {
  recursive?: boolean
}

/**
 * Lazily yield the files below `dir` as `/`-separated paths relative to it,
 * depth-first, in directory-listing order. Symbolic links are yielded as
 * entries and never followed.
 */
export async function* walkFiles(
  dir: string,
  options: WalkOptions = {},
  prefix = "",
): AsyncGenerator<string, void, undefined> {
  const entries = await fs.readdir(dir, { withFileTypes: true })

  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name

    if (entry.isDirectory()) {
      if (options.recursive) {
        yield* walkFiles(path.join(dir, entry.name), options, relativePath)
      }
    } else {
      yield relativePath
    }
  }
}
