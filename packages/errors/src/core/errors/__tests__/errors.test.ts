import { FileSystemError, isFileSystemError } from "../file-system-error"
import { isNotFoundError, NotFoundError } from "../not-found-error"
import { isParseError, ParseError } from "../parse-error"

describe("NotFoundError", () => {
  it("uses the not_found code and keeps context", () => {
    const err = new NotFoundError("Configuration file not found", {
      context: { path: "/etc/app/config.json" },
    })

    expect(err.code).toBe("not_found")
    expect(err.name).toBe("NotFoundError")
    expect(err.context).toEqual({ path: "/etc/app/config.json" })
    expect(isNotFoundError(err)).toBe(true)
    expect(isNotFoundError(new Error("x"))).toBe(false)
  })
})

describe("ParseError", () => {
  it("uses the parse_error code and keeps the cause", () => {
    const cause = new SyntaxError("Unexpected token")
    const err = new ParseError("Invalid JSON", { cause })

    expect(err.code).toBe("parse_error")
    expect(err.cause).toBe(cause)
    expect(isParseError(err)).toBe(true)
  })
})

describe("FileSystemError", () => {
  it("fromErrno() copies errno and syscall into context", () => {
    const errno: NodeJS.ErrnoException = Object.assign(
      new Error("EEXIST: file already exists, rename 'a' -> 'b'"),
      { code: "EEXIST", syscall: "rename" },
    )

    const err = FileSystemError.fromErrno(errno, "/tmp/b")

    expect(err.code).toBe("file_system_error")
    expect(err.message).toBe("EEXIST: file already exists, rename 'a' -> 'b'")
    expect(err.cause).toBe(errno)
    expect(err.context).toEqual({ path: "/tmp/b", errno: "EEXIST", syscall: "rename" })
    expect(isFileSystemError(err)).toBe(true)
  })

  it("fromErrno() omits fields the exception does not have", () => {
    const err = FileSystemError.fromErrno(new Error("odd"), "/tmp/x")

    expect(err.context).toEqual({ path: "/tmp/x" })
  })
})
