const PERMISSION_BITS = [
  [0o400, "r"],
  [0o200, "w"],
  [0o100, "x"],
  [0o40, "r"],
  [0o20, "w"],
  [0o10, "x"],
  [0o4, "r"],
  [0o2, "w"],
  [0o1, "x"],
] as const

/**
 * `0o755` → `"rwxr-xr-x"`. Bits above the permission triplets are ignored.
 */
export function getPermissionString(mode: number): string {
  return PERMISSION_BITS.map(([bit, flag]) => (mode & bit ? flag : "-")).join("")
}
