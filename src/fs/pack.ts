import { createReadStream, createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createZipPacker, type ZipPackController } from "../web/index";
import { encoder } from "../web/utils";
import { isErrnoException } from "./path";
import type { CompressOptionsFS, PackOptionsFS } from "./types";

/**
 * Pack a directory into a Node.js [`Readable`](https://nodejs.org/api/stream.html#class-streamreadable) stream containing zip archive bytes.
 *
 * Recursively walks the directory in sorted order and creates zip entries for
 * files, directories, and symlinks, with paths relative to the directory. The
 * directory itself is not an entry. Sockets, FIFOs and devices are skipped.
 *
 * @param directoryPath - Path to directory to pack
 * @param options - Optional packing configuration
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs';
 * import { pipeline } from 'node:stream/promises';
 * import { packZip } from 'tgz2zip';
 *
 * await pipeline(packZip('notes_tmp', { level: 9 }), createWriteStream('notes.zip'));
 * ```
 */
export function packZip(
	directoryPath: string,
	options: PackOptionsFS = {},
): Readable {
	const { readable, controller } = createZipPacker({ level: options.level });
	const getStat = options.dereference ? fs.stat : fs.lstat;

	// Directories on the current walk path, to catch symlink cycles when dereferencing.
	const ancestors = new Set<string>();

	async function walk(relativePath: string): Promise<void> {
		const fullPath = path.join(directoryPath, relativePath);
		const stat = await getStat(fullPath);
		const name = relativePath.split(path.sep).join("/");

		if (stat.isDirectory()) {
			const key = `${stat.dev}:${stat.ino}`;
			if (ancestors.has(key)) {
				throw new Error(`Symbolic link cycle detected at "${name}".`);
			}

			await controller
				.add({
					name: `${name}/`,
					type: "directory",
					mode: stat.mode,
					mtime: stat.mtime,
				})
				.close();

			ancestors.add(key);
			for (const child of await readSortedDir(fullPath)) {
				await walk(path.join(relativePath, child));
			}
			ancestors.delete(key);
			return;
		}

		if (stat.isSymbolicLink()) {
			const target = await fs.readlink(fullPath);
			await writeSymlink(controller, name, stat.mtime, target);
			return;
		}

		if (stat.isFile()) {
			const entryStream = controller.add({
				name,
				type: "file",
				mode: stat.mode,
				mtime: stat.mtime,
			});
			await pipeline(createReadStream(fullPath), Writable.fromWeb(entryStream));
		}
	}

	(async () => {
		const root = await fs.stat(directoryPath);
		if (!root.isDirectory()) {
			throw new Error(`"${directoryPath}" is not a directory.`);
		}

		ancestors.add(`${root.dev}:${root.ino}`);
		for (const child of await readSortedDir(directoryPath)) {
			await walk(child);
		}
	})().then(
		() => controller.finalize(),
		(err: unknown) => controller.error(err),
	);

	return Readable.fromWeb(readable);
}

/**
 * Write a directory to a zip archive on disk.
 *
 * Without `overwrite`, the archive is created exclusively and an existing file
 * fails with an `EEXIST` error, leaving that file untouched. A partially
 * written archive is removed when packing fails.
 *
 * @example
 * ```typescript
 * await compressDirectory('notes_tmp', 'notes.zip', { overwrite: true });
 * ```
 */
export async function compressDirectory(
	directoryPath: string,
	archivePath: string,
	options: CompressOptionsFS = {},
): Promise<void> {
	const output = createWriteStream(archivePath, {
		flags: options.overwrite ? "w" : "wx",
	});

	try {
		await pipeline(packZip(directoryPath, options), output, {
			signal: options.signal,
		});
	} catch (err) {
		// An existing archive was never opened, so it is not ours to remove.
		if (!(isErrnoException(err) && err.code === "EEXIST")) {
			await fs.rm(archivePath, { force: true });
		}
		throw err;
	}
}

// A zip symlink is a regular entry whose body is the link target.
async function writeSymlink(
	controller: ZipPackController,
	name: string,
	mtime: Date,
	target: string,
): Promise<void> {
	const writer = controller.add({ name, type: "symlink", mtime }).getWriter();
	await writer.write(encoder.encode(target));
	await writer.close();
}

async function readSortedDir(directoryPath: string): Promise<string[]> {
	const names = await fs.readdir(directoryPath);
	// Code unit order, so the same tree always produces the same archive.
	return names.sort();
}
