/**
 * Entry types a tar header can describe.
 */
export type TarEntryType =
	| "file"
	| "directory"
	| "symlink"
	| "link"
	| "character-device"
	| "block-device"
	| "fifo"
	| "pax-header"
	| "pax-global-header"
	| "gnu-long-name"
	| "gnu-long-link-name";

/**
 * Header information for a tar entry, after PAX and GNU extensions are applied.
 */
export interface TarHeader {
	/** Entry name/path. Directories end with a slash. */
	name: string;
	/** Size of the entry data in bytes. 0 for directories, symlinks, and hardlinks. */
	size: number;
	/** Modification time. */
	mtime?: Date;
	/** Unix permission bits (e.g., 0o644). */
	mode?: number;
	/** Entry type. */
	type: TarEntryType;
	uid?: number;
	gid?: number;
	uname?: string;
	gname?: string;
	/** Target path for symlinks and hard links. */
	linkname?: string;
	/** PAX extended attributes as key-value pairs. */
	pax?: Record<string, string>;
}

/**
 * Represents an entry parsed from a tar archive stream.
 *
 * The body must be consumed (or cancelled) before the next entry is read.
 */
export interface ParsedTarEntry {
	header: TarHeader;
	body: ReadableStream<Uint8Array>;
}

/**
 * Options for {@link createTarDecoder}.
 */
export interface DecoderOptions {
	/**
	 * Validate header checksums and the `ustar` magic, and reject truncated
	 * archives or non-zero data after the end-of-archive marker.
	 *
	 * @default true
	 */
	strict?: boolean;
}

/**
 * Header for an entry written by {@link createZipPacker}.
 */
export interface ZipEntryHeader {
	/** Path inside the archive, using forward slashes. Directories end with a slash. */
	name: string;
	type: "file" | "directory" | "symlink";
	/** Unix permission bits, recorded in the external attributes. */
	mode?: number;
	mtime?: Date;
	/** Per-entry deflate level. Overrides the packer's level. */
	level?: ZipLevel;
}

/** Deflate level: 0 stores the entry uncompressed, 9 compresses hardest. */
export type ZipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Options for {@link createZipPacker}.
 */
export interface ZipPackerOptions {
	/**
	 * Deflate level for file entries.
	 *
	 * @default 6
	 */
	level?: ZipLevel;
}
