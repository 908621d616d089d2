import { compressDirectory, extractTarGz } from "../fs/index";
import type { ZipLevel } from "../web/types";

export interface ExtractAllOptions {
	signal?: AbortSignal;
}

export interface CompressAllOptions {
	overwrite: boolean;
	level?: ZipLevel;
	dereference?: boolean;
	signal?: AbortSignal;
}

/**
 * The two capabilities a conversion needs from the archive formats. The
 * converter only talks to this interface, so tests can swap in fakes.
 */
export interface ArchiveCodec {
	/** Unpack a gzip-compressed tar archive into an existing directory. */
	extractAll(
		archivePath: string,
		destDir: string,
		options?: ExtractAllOptions,
	): Promise<void>;
	/**
	 * Write the contents of a directory to a zip archive. Without `overwrite`
	 * an existing archive must fail with an `EEXIST` error.
	 */
	compressAll(
		sourceDir: string,
		archivePath: string,
		options: CompressAllOptions,
	): Promise<void>;
}

export const defaultCodec: ArchiveCodec = {
	extractAll: (archivePath, destDir, options = {}) =>
		extractTarGz(archivePath, destDir, { signal: options.signal }),
	compressAll: (sourceDir, archivePath, options) =>
		compressDirectory(sourceDir, archivePath, options),
};
