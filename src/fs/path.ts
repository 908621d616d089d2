import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

const cache = new Map<string, string>();
const MAX_CACHE_SIZE = 10000;

// Entry names repeat their directory prefixes, so normalized forms are kept in a small LRU.
export const normalizeUnicode = (s: string): string => {
	const cached = cache.get(s);

	// On a cache hit, delete the entry so it can be re-added at the end.
	if (cached !== undefined) cache.delete(s);

	const result = cached ?? s.normalize("NFD");
	cache.set(s, result);

	// Prune the cache if it's more than 10% over the max size.
	const overflow = cache.size - MAX_CACHE_SIZE;
	if (overflow > MAX_CACHE_SIZE / 10) {
		let removed = 0;
		for (const key of cache.keys()) {
			if (removed++ >= overflow) break;
			cache.delete(key);
		}
	}

	return result;
};

/**
 * Converts a tar entry name to a relative path, dropping `.` segments and the
 * trailing slash of directories. Returns an empty string for the archive root.
 */
export function toRelativeEntryPath(name: string): string {
	return name
		.split("/")
		.filter((segment) => segment !== "" && segment !== ".")
		.join("/");
}

/**
 * Recursively validates that each component of the given path, from the root
 * down, is a directory or a symlink that stays inside the root.
 *
 * Validated components are added to `validated`, keyed by their NFD form, so
 * later entries in the same directory skip the filesystem checks. The
 * filesystem itself is always queried with the path as given.
 */
export async function validatePath(
	currentPath: string,
	root: string,
	validated: Set<string>,
): Promise<void> {
	const key = normalizeUnicode(currentPath);

	if (key === normalizeUnicode(root) || validated.has(key)) {
		return;
	}

	validateBounds(
		currentPath,
		root,
		`Path traversal attempt detected: "${currentPath}" is outside the extraction directory.`,
	);

	let stat: Stats;
	try {
		stat = await fs.lstat(currentPath);
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			// Component doesn't exist yet, so only its parent needs validating.
			await validatePath(path.dirname(currentPath), root, validated);
			validated.add(key);
			return;
		}

		throw err;
	}

	if (stat.isDirectory()) {
		await validatePath(path.dirname(currentPath), root, validated);
		validated.add(key);
		return;
	}

	if (stat.isSymbolicLink()) {
		const realPath = await fs.realpath(currentPath);

		validateBounds(
			realPath,
			root,
			`Path traversal attempt detected: symlink "${currentPath}" points outside the extraction directory.`,
		);

		await validatePath(path.dirname(currentPath), root, validated);
		validated.add(key);
		return;
	}

	throw new Error(
		`Path traversal attempt detected: "${currentPath}" is not a valid directory component.`,
	);
}

// Validates that the target path is within the destination directory. Both
// sides are compared in NFD form, so differently composed names cannot slip past.
export function validateBounds(
	targetPath: string,
	destDir: string,
	errorMessage: string,
): void {
	const normalizedTarget = normalizeUnicode(targetPath);
	const normalizedDest = normalizeUnicode(destDir);
	if (
		!(
			normalizedTarget === normalizedDest ||
			normalizedTarget.startsWith(normalizedDest + path.sep)
		)
	) {
		throw new Error(errorMessage);
	}
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
