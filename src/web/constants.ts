import type { TarEntryType } from "./types";

/** Size of a TAR block in bytes. */
export const BLOCK_SIZE = 512;

/** Offsets and sizes of fields in a USTAR header block.
 *
 * @see https://www.gnu.org/software/tar/manual/html_node/Standard.html
 */
export const USTAR = {
	name: { offset: 0, size: 100 },
	mode: { offset: 100, size: 8 },
	uid: { offset: 108, size: 8 },
	gid: { offset: 116, size: 8 },
	size: { offset: 124, size: 12 },
	mtime: { offset: 136, size: 12 },
	checksum: { offset: 148, size: 8 },
	typeflag: { offset: 156, size: 1 },
	linkname: { offset: 157, size: 100 },
	magic: { offset: 257, size: 6 },
	version: { offset: 263, size: 2 },
	uname: { offset: 265, size: 32 },
	gname: { offset: 297, size: 32 },
	prefix: { offset: 345, size: 155 },
} as const;

/** Reverse mapping from tar type flag characters to entry types. */
export const FLAGTYPE: Readonly<Record<string, TarEntryType>> = {
	"0": "file",
	// Pre-POSIX archives mark regular files with a NUL type flag.
	"": "file",
	"1": "link",
	"2": "symlink",
	"3": "character-device",
	"4": "block-device",
	"5": "directory",
	"6": "fifo",
	"7": "file",
	// POSIX.1-2001 extensions
	x: "pax-header",
	g: "pax-global-header",
	// GNU extensions
	L: "gnu-long-name",
	K: "gnu-long-link-name",
};

/** Default deflate level for zip entries. */
export const DEFAULT_ZIP_LEVEL = 6;

/** "Version made by" host id for Unix in the zip central directory. */
export const ZIP_OS_UNIX = 3;

/** Unix file type bits. */
export const S_IFREG = 0o100000;
export const S_IFDIR = 0o040000;
export const S_IFLNK = 0o120000;

/**
 * Zip stores modification times as local MS-DOS dates. The encoder accepts
 * years 1980 through 2099.
 */
export const DOS_DATE_MIN = new Date(1980, 0, 1, 0, 0, 0).getTime();
export const DOS_DATE_MAX = new Date(2099, 11, 31, 23, 59, 58).getTime();
