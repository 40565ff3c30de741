/**
 * Render raw `st_mode` bits the way `ls -l` does.
 *
 * Supports:
 *   - octal permission digits: 0o40750 -> "750"
 *   - 10-character symbolic form: 0o40750 -> "drwxr-x---"
 *
 * @example
 *   formatModeOctal(0o100644)    // "644"
 *   formatModeSymbolic(0o104755) // "-rwsr-xr-x"
 */

// Type bits (S_IFMT family)
export const S_IFMT = 0o170000
export const S_IFLNK = 0o120000
export const S_IFREG = 0o100000
export const S_IFBLK = 0o060000
export const S_IFDIR = 0o040000
export const S_IFCHR = 0o020000
export const S_IFIFO = 0o010000

// Special bits
export const S_ISUID = 0o4000
export const S_ISGID = 0o2000
export const S_ISVTX = 0o1000

// Permission bits
export const S_IRUSR = 0o400
export const S_IWUSR = 0o200
export const S_IXUSR = 0o100
export const S_IRGRP = 0o040
export const S_IWGRP = 0o020
export const S_IXGRP = 0o010
export const S_IROTH = 0o004
export const S_IWOTH = 0o002
export const S_IXOTH = 0o001

/** Permission and special bits, without the file type (S_IMODE). */
export const permissionBits = (mode: number): number => mode & 0o7777

export const isDirectoryMode = (mode: number): boolean => (mode & S_IFMT) === S_IFDIR

export const isSymlinkMode = (mode: number): boolean => (mode & S_IFMT) === S_IFLNK

interface ModeRule {
  readonly mask: number
  readonly char: string
}

/**
 * One slot per output character. Within a slot the first rule whose mask is
 * fully set wins; no match renders "-".
 *
 * The type slot is order-sensitive: S_IFLNK and S_IFBLK share bits with the
 * entries after them, so they must be tested first.
 */
const MODE_SLOTS: ReadonlyArray<ReadonlyArray<ModeRule>> = [
  [
    { mask: S_IFLNK, char: "l" },
    { mask: S_IFREG, char: "-" },
    { mask: S_IFBLK, char: "b" },
    { mask: S_IFDIR, char: "d" },
    { mask: S_IFCHR, char: "c" },
    { mask: S_IFIFO, char: "p" },
  ],

  [{ mask: S_IRUSR, char: "r" }],
  [{ mask: S_IWUSR, char: "w" }],
  [
    { mask: S_IXUSR | S_ISUID, char: "s" },
    { mask: S_ISUID, char: "S" },
    { mask: S_IXUSR, char: "x" },
  ],

  [{ mask: S_IRGRP, char: "r" }],
  [{ mask: S_IWGRP, char: "w" }],
  [
    { mask: S_IXGRP | S_ISGID, char: "s" },
    { mask: S_ISGID, char: "S" },
    { mask: S_IXGRP, char: "x" },
  ],

  [{ mask: S_IROTH, char: "r" }],
  [{ mask: S_IWOTH, char: "w" }],
  [
    { mask: S_IXOTH | S_ISVTX, char: "t" },
    { mask: S_ISVTX, char: "T" },
    { mask: S_IXOTH, char: "x" },
  ],
]

const renderSlot = (mode: number, rules: ReadonlyArray<ModeRule>): string =>
  rules.find((rule) => (mode & rule.mask) === rule.mask)?.char ?? "-"

export const formatModeSymbolic = (mode: number): string =>
  MODE_SLOTS.map((rules) => renderSlot(mode, rules)).join("")

/**
 * Last three octal digits of the permission bits. Special bits fall off the
 * front: 0o4755 renders as "755".
 */
export const formatModeOctal = (mode: number): string =>
  permissionBits(mode).toString(8).padStart(3, "0").slice(-3)
