import path from "node:path"
import { isNotFoundError, ParseError } from "@fieldkit/errors"
import type { ConfigSource } from "../../ports/source"
import { describeJsonType, isPlainObject, readJsonFile } from "./read-json"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: rejects with NotFoundError if the file is missing.
   * - `false`: resolves to an empty document if the file is missing.
   *
   * @default true
   */
  required?: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** One JSON file holding the whole document, e.g. `{"camera": {"index": 0}}`. */
export class JsonSource implements ConfigSource {
  readonly name: string
  readonly filePath: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)
    this.name = `json:${this.filePath}`
  }

  async load(): Promise<Record<string, unknown>> {
    let document: unknown

    try {
      document = await readJsonFile(this.filePath)
    } catch (err) {
      if (this.opts.required === false && isNotFoundError(err)) return {}
      throw err
    }

    if (!isPlainObject(document)) {
      throw new ParseError(
        `Expected a JSON object at the top level of ${this.filePath}, got ${describeJsonType(document)}`,
        { context: { path: this.filePath } },
      )
    }

    return document
  }
}
