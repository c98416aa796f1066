import path from "node:path"
import { FileManager } from "@fieldkit/files"
import type { Logger } from "@fieldkit/logger"
import { setOwn } from "../../core/utils/set-own"
import type { ConfigSource } from "../../ports/source"
import { readJsonFile } from "../json/read-json"

export type DirectorySourceOptions = {
  /** Directory holding one `<section>.json` file per section. */
  dir: string

  /**
   * Base directory for resolving a relative `dir`.
   *
   * @default process.cwd()
   */
  cwd?: string

  logger?: Logger
}

/**
 * A directory of JSON files, one per section: `camera.json` supplies the
 * `camera` section. Only files directly inside the directory are read, in
 * name order.
 */
export class DirectorySource implements ConfigSource {
  readonly name: string
  readonly dir: string

  private readonly files: FileManager

  constructor(opts: DirectorySourceOptions) {
    this.dir = path.resolve(opts.cwd ?? process.cwd(), opts.dir)
    this.name = `dir:${this.dir}`
    this.files = new FileManager({
      rootPath: this.dir,
      ...(opts.logger !== undefined && { logger: opts.logger }),
    })
  }

  async load(): Promise<Record<string, unknown>> {
    const names = await this.files.getFilesByExtension(".", ".json")
    const sections: Record<string, unknown> = {}

    for (const name of names.sort()) {
      setOwn(sections, path.basename(name, ".json"), await readJsonFile(this.files.resolve(name)))
    }

    return sections
  }
}
