import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException } from "../fs/path";
import { DEFAULT_SUFFIXES, matchSuffix } from "./naming";

/**
 * A candidate input archive found by {@link findArchives}.
 */
export interface InputArchive {
	/** Absolute path of the archive. */
	path: string;
	/** File name, including the suffix. */
	name: string;
	/** File name without the recognized suffix. */
	baseName: string;
	/** The recognized suffix that matched. */
	suffix: string;
}

/**
 * Describes a single archive path as an {@link InputArchive}. Returns
 * undefined when the name carries none of the suffixes.
 */
export function toInputArchive(
	archivePath: string,
	suffixes: readonly string[] = DEFAULT_SUFFIXES,
): InputArchive | undefined {
	const name = path.basename(archivePath);
	const suffix = matchSuffix(name, suffixes);
	if (suffix === undefined) return undefined;

	return {
		path: path.resolve(archivePath),
		name,
		baseName: name.slice(0, name.length - suffix.length),
		suffix,
	};
}

/**
 * Lists the archives in a directory, in code unit order of their names.
 *
 * Only regular files (or symlinks to them) whose names end in one of the
 * suffixes are yielded. Subdirectories are not searched. The directory is read
 * once, when iteration starts.
 *
 * @example
 * ```typescript
 * for await (const archive of findArchives("./exports", [".tar.gz", ".tgz"])) {
 *   console.log(archive.baseName);
 * }
 * ```
 */
export async function* findArchives(
	directory: string,
	suffixes: readonly string[] = DEFAULT_SUFFIXES,
): AsyncGenerator<InputArchive, void, undefined> {
	const dirents = await fs.readdir(directory, { withFileTypes: true });
	dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

	for (const dirent of dirents) {
		const archive = toInputArchive(path.join(directory, dirent.name), suffixes);
		if (archive === undefined) continue;

		if (await isRegularFile(dirent, archive.path)) yield archive;
	}
}

async function isRegularFile(dirent: Dirent, fullPath: string): Promise<boolean> {
	if (dirent.isFile()) return true;
	if (!dirent.isSymbolicLink()) return false;

	try {
		return (await fs.stat(fullPath)).isFile();
	} catch (err) {
		// Dangling links are not candidates.
		if (isErrnoException(err) && err.code === "ENOENT") return false;
		throw err;
	}
}
