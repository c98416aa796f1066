import fs from "node:fs/promises"
import { ParseError } from "@fieldkit/errors"
import { toFsError } from "@fieldkit/files"

/**
 * Read and decode a UTF-8 JSON file.
 *
 * @throws NotFoundError when the file does not exist
 * @throws ParseError when the content is not valid JSON
 * @throws FileSystemError for any other read failure
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string

  try {
    content = await fs.readFile(filePath, "utf-8")
  } catch (err) {
    throw toFsError(err, filePath)
  }

  try {
    return JSON.parse(content)
  } catch (err) {
    throw new ParseError(`Invalid JSON in ${filePath}`, {
      cause: err,
      context: { path: filePath },
    })
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function describeJsonType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
