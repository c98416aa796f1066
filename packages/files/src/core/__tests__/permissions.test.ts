import { getPermissionString } from "../permissions"

describe("getPermissionString", () => {
  it.each([
    [0o755, "rwxr-xr-x"],
    [0o644, "rw-r--r--"],
    [0o700, "rwx------"],
    [0o000, "---------"],
    [0o777, "rwxrwxrwx"],
  ])("formats %o as %s", (mode, expected) => {
    expect(getPermissionString(mode)).toBe(expected)
  })

  it("ignores file type bits", () => {
    expect(getPermissionString(0o100644)).toBe("rw-r--r--")
  })
})
