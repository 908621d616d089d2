/** Suffixes recognized as gzip-compressed tar archives when none are configured. */
export const DEFAULT_SUFFIXES: readonly string[] = [".tar.gz"];

/** Appended to the base name to name the staging directory. */
export const STAGING_SUFFIX = "_tmp";

/** Extension of the converted archive. */
export const OUTPUT_EXTENSION = ".zip";

/**
 * Returns the longest recognized suffix of `fileName`, or undefined when none
 * matches or nothing would be left of the name.
 */
export function matchSuffix(
	fileName: string,
	suffixes: readonly string[] = DEFAULT_SUFFIXES,
): string | undefined {
	let match: string | undefined;

	for (const suffix of suffixes) {
		if (
			fileName.length > suffix.length &&
			fileName.endsWith(suffix) &&
			(match === undefined || suffix.length > match.length)
		) {
			match = suffix;
		}
	}

	return match;
}

/**
 * Strips the recognized archive suffix: `notes.tar.gz` becomes `notes`.
 */
export function deriveBaseName(
	fileName: string,
	suffixes: readonly string[] = DEFAULT_SUFFIXES,
): string | undefined {
	const suffix = matchSuffix(fileName, suffixes);
	return suffix === undefined
		? undefined
		: fileName.slice(0, fileName.length - suffix.length);
}

export function stagingDirName(baseName: string): string {
	return `${baseName}${STAGING_SUFFIX}`;
}

export function outputFileName(baseName: string): string {
	return `${baseName}${OUTPUT_EXTENSION}`;
}
