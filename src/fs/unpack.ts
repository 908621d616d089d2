import { createReadStream, createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
import type { ParsedTarEntry } from "../web/index";
import { createTarDecoder } from "../web/index";
import {
	isErrnoException,
	normalizeUnicode,
	toRelativeEntryPath,
	validateBounds,
	validatePath,
} from "./path";
import type { UnpackOptionsFS } from "./types";

interface ExtractState {
	destDir: string;
	// NFD keys of directories already checked.
	validatedDirs: Set<string>;
	// Directory times are applied last, since writing children changes them.
	directoryTimes: { path: string; mtime: Date }[];
	maxDepth: number;
	validateSymlinks: boolean;
	signal: AbortSignal;
}

/**
 * Extract a tar archive to a directory.
 *
 * Returns a Node.js [`Writable`](https://nodejs.org/api/stream.html#class-streamwritable)
 * stream to pipe tar archive bytes into. Files, directories, symlinks, and hardlinks
 * are written with their permissions (owner read/write always kept) and timestamps.
 * Entries that would land outside the directory fail the extraction.
 *
 * @param directoryPath - Path to directory where files will be extracted
 * @param options - Optional extraction configuration
 *
 * @example
 * ```typescript
 * import { createReadStream } from 'node:fs';
 * import { pipeline } from 'node:stream/promises';
 * import { createGunzip } from 'node:zlib';
 * import { unpackTar } from 'tgz2zip';
 *
 * await pipeline(
 *   createReadStream('notes.tar.gz'),
 *   createGunzip(),
 *   unpackTar('notes_tmp'),
 * );
 * ```
 */
export function unpackTar(
	directoryPath: string,
	options: UnpackOptionsFS = {},
): Writable {
	// Create a stream pair for proper backpressure handling.
	const { readable, writable: webWritable } = new TransformStream<
		Uint8Array,
		Uint8Array
	>();

	const entryStream = readable.pipeThrough(
		createTarDecoder({ strict: options.strict }),
	);

	// Stops in-flight file writes when the stream is torn down.
	const teardown = new AbortController();
	const processingPromise = extractEntries(entryStream, directoryPath, {
		maxDepth: options.maxDepth ?? 1024,
		validateSymlinks: options.validateSymlinks ?? true,
		signal: teardown.signal,
	});

	const webWriter = webWritable.getWriter();
	let isWriterClosed = false;

	const writable = new Writable({
		async write(chunk: Buffer, _encoding, callback) {
			if (isWriterClosed) return callback();

			try {
				// Resolves only once the decoder can take more data.
				await webWriter.write(chunk);
				callback();
			} catch (err) {
				callback(toError(err));
			}
		},

		async final(callback) {
			if (isWriterClosed) return callback();
			isWriterClosed = true;

			try {
				await webWriter.close();
				await processingPromise;
				callback();
			} catch (err) {
				callback(toError(err));
			}
		},

		destroy(err, callback) {
			teardown.abort(err ?? new Error("Extraction stream was destroyed."));
			isWriterClosed = true;

			const settle = () => {
				processingPromise.then(
					() => callback(err),
					(processingError: unknown) =>
						callback(err ?? toError(processingError)),
				);
			};

			// Erroring the writer errors the decoder, which ends the entry loop.
			webWriter.abort(err).then(settle, settle);
		},
	});

	// A failed entry stops the upload instead of leaving writes blocked on backpressure.
	processingPromise.catch((err: unknown) => {
		writable.destroy(toError(err));
	});

	return writable;
}

/**
 * Extract a gzip-compressed tar archive from disk into a directory.
 *
 * @example
 * ```typescript
 * await extractTarGz('notes.tar.gz', 'notes_tmp');
 * ```
 */
export async function extractTarGz(
	archivePath: string,
	directoryPath: string,
	options: UnpackOptionsFS = {},
): Promise<void> {
	await pipeline(
		createReadStream(archivePath),
		createGunzip(),
		unpackTar(directoryPath, options),
		{ signal: options.signal },
	);
}

async function extractEntries(
	entries: ReadableStream<ParsedTarEntry>,
	directoryPath: string,
	options: Pick<ExtractState, "maxDepth" | "validateSymlinks" | "signal">,
): Promise<void> {
	await fs.mkdir(directoryPath, { recursive: true });

	// Compare against the real path, or symlinked temp directories look like escapes.
	const destDir = await fs.realpath(directoryPath);
	const state: ExtractState = {
		...options,
		destDir,
		validatedDirs: new Set<string>([normalizeUnicode(destDir)]),
		directoryTimes: [],
	};

	const reader = entries.getReader();
	try {
		while (true) {
			const { done, value: entry } = await reader.read();
			if (done) break;

			await extractEntry(entry, state);
		}
	} finally {
		reader.releaseLock();
	}

	// Innermost directories first, so setting a parent's time is the last change to it.
	for (const { path: dirPath, mtime } of state.directoryTimes.reverse()) {
		await fs.utimes(dirPath, mtime, mtime);
	}
}

async function extractEntry(
	entry: ParsedTarEntry,
	state: ExtractState,
): Promise<void> {
	const { header } = entry;
	const { destDir, validatedDirs } = state;

	if (path.isAbsolute(header.name) || header.name.startsWith("/")) {
		throw new Error(
			`Path traversal attempt detected for entry "${header.name}".`,
		);
	}

	// Names are written as stored; only path checks compare normalized forms.
	const relativePath = toRelativeEntryPath(header.name);

	// The archive root ("./") is the extraction directory itself.
	if (relativePath === "") {
		await entry.body.cancel();
		return;
	}

	const depth = relativePath.split("/").length;
	if (depth > state.maxDepth) {
		throw new Error(
			`Path depth of entry "${header.name}" (${depth}) exceeds the maximum allowed depth of ${state.maxDepth}.`,
		);
	}

	const outPath = path.join(destDir, relativePath);

	validateBounds(
		outPath,
		destDir,
		`Path traversal attempt detected for entry "${header.name}".`,
	);

	const parentDir = path.dirname(outPath);

	await validatePath(parentDir, destDir, validatedDirs);
	await fs.mkdir(parentDir, { recursive: true });

	const mtime = validDate(header.mtime);

	switch (header.type) {
		case "directory": {
			await entry.body.cancel();
			await fs.mkdir(outPath, {
				recursive: true,
				mode: (header.mode ?? 0o755) | 0o700,
			});

			validatedDirs.add(normalizeUnicode(outPath));
			if (mtime) state.directoryTimes.push({ path: outPath, mtime });
			break;
		}

		case "file": {
			await removeNonDirectory(outPath);
			await pipeline(
				Readable.fromWeb(entry.body),
				createWriteStream(outPath, { mode: (header.mode ?? 0o644) | 0o600 }),
				{ signal: state.signal },
			);

			if (mtime) await fs.utimes(outPath, mtime, mtime);
			break;
		}

		case "symlink": {
			await entry.body.cancel();
			if (!header.linkname) break;

			if (state.validateSymlinks) {
				const resolvedTarget = path.resolve(parentDir, header.linkname);
				validateBounds(
					resolvedTarget,
					destDir,
					`Symlink target "${header.linkname}" points outside the extraction directory.`,
				);
			}

			await removeNonDirectory(outPath);
			await fs.symlink(header.linkname, outPath);

			// A directory path replaced by a symlink must be validated again.
			//
			// Windows normalizes paths aggressively, so drop the whole cache there.
			if (process.platform === "win32") {
				validatedDirs.clear();
				validatedDirs.add(normalizeUnicode(destDir));
			} else {
				validatedDirs.delete(normalizeUnicode(outPath));
			}

			if (mtime) await fs.lutimes(outPath, mtime, mtime);
			break;
		}

		case "link": {
			await entry.body.cancel();
			if (!header.linkname) break;

			if (path.isAbsolute(header.linkname)) {
				throw new Error(
					`Hardlink target "${header.linkname}" points outside the extraction directory.`,
				);
			}

			const resolvedLinkTarget = path.resolve(destDir, header.linkname);
			validateBounds(
				resolvedLinkTarget,
				destDir,
				`Hardlink target "${header.linkname}" points outside the extraction directory.`,
			);

			await validatePath(
				path.dirname(resolvedLinkTarget),
				destDir,
				validatedDirs,
			);

			await removeNonDirectory(outPath);
			await fs.link(resolvedLinkTarget, outPath);
			break;
		}

		default: {
			// Devices and FIFOs have no zip representation.
			await entry.body.cancel();
			break;
		}
	}
}

// Later entries replace earlier ones, as with tar itself. Writing through a
// leftover symlink would otherwise follow it.
async function removeNonDirectory(target: string): Promise<void> {
	try {
		const stat = await fs.lstat(target);
		if (!stat.isDirectory()) await fs.unlink(target);
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") return;
		throw err;
	}
}

function validDate(date: Date | undefined): Date | undefined {
	return date && !Number.isNaN(date.getTime()) ? date : undefined;
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
