import type { DecoderOptions, ZipLevel } from "../web/types";

/**
 * Filesystem extraction options.
 */
export interface UnpackOptionsFS extends DecoderOptions {
	/**
	 * Maximum number of path segments in an entry name. Deeper entries fail the
	 * extraction.
	 *
	 * @default 1024
	 */
	maxDepth?: number;
	/**
	 * Reject symlinks whose target resolves outside the extraction directory.
	 *
	 * @default true
	 */
	validateSymlinks?: boolean;
	/** Aborts the extraction. Partially written files are left in place. */
	signal?: AbortSignal;
}

/**
 * Filesystem zip packing options.
 */
export interface PackOptionsFS {
	/**
	 * Deflate level for file entries.
	 *
	 * @default 6
	 */
	level?: ZipLevel;
	/**
	 * Follow symbolic links and store what they point to. When false, links are
	 * stored as symlink entries holding their target path.
	 *
	 * @default false
	 */
	dereference?: boolean;
}

/**
 * Options for writing a zip archive to disk.
 */
export interface CompressOptionsFS extends PackOptionsFS {
	/**
	 * Replace an existing archive. When false, the archive is created
	 * exclusively and an existing file fails with `EEXIST`.
	 *
	 * @default false
	 */
	overwrite?: boolean;
	signal?: AbortSignal;
}
