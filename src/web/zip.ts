import { Zip, ZipDeflate, ZipPassThrough } from "fflate";
import {
	DEFAULT_ZIP_LEVEL,
	DOS_DATE_MAX,
	DOS_DATE_MIN,
	S_IFDIR,
	S_IFLNK,
	S_IFREG,
	ZIP_OS_UNIX,
} from "./constants";
import type { ZipEntryHeader, ZipPackerOptions } from "./types";

// MS-DOS directory attribute, kept alongside the Unix mode for non-Unix readers.
const DOS_ATTR_DIRECTORY = 0x10;

/**
 * Controls a streaming zip packing process.
 *
 * Mirrors a tar packer: entries are added one at a time, each returning a
 * [`WritableStream`](https://developer.mozilla.org/en-US/docs/Web/API/WritableStream)
 * for its body, and the archive is closed with {@link ZipPackController.finalize}.
 */
export interface ZipPackController {
	/**
	 * Add an entry to the zip archive.
	 *
	 * Write the entry's body to the returned stream and close it. Directory
	 * entries have no body, so close the stream right away. A symlink's body
	 * is its target path.
	 *
	 * @example
	 * ```typescript
	 * const fileStream = controller.add({ name: "docs/readme.txt", type: "file" });
	 * const writer = fileStream.getWriter();
	 * await writer.write(new TextEncoder().encode("hello"));
	 * await writer.close();
	 *
	 * await controller.add({ name: "docs/", type: "directory" }).close();
	 * ```
	 */
	add(header: ZipEntryHeader): WritableStream<Uint8Array>;

	/**
	 * Finalize the archive.
	 *
	 * Must be called after all entries have been added. The central directory is
	 * written once every entry body has been closed, then the readable stream closes.
	 */
	finalize(): void;

	/**
	 * Abort the packing process with an error.
	 */
	error(err: unknown): void;
}

/**
 * Create a streaming zip packer.
 *
 * @returns readable - [`ReadableStream`](https://developer.mozilla.org/en-US/docs/Web/API/ReadableStream) that outputs the zip archive bytes
 * @returns controller - {@link ZipPackController} for adding entries and finalizing
 *
 * @example
 * ```typescript
 * import { createZipPacker } from "tgz2zip";
 *
 * const { readable, controller } = createZipPacker({ level: 9 });
 *
 * const writer = controller.add({ name: "hello.txt", type: "file" }).getWriter();
 * await writer.write(new TextEncoder().encode("hello"));
 * await writer.close();
 * controller.finalize();
 *
 * const bytes = new Uint8Array(await new Response(readable).arrayBuffer());
 * ```
 */
export function createZipPacker(options: ZipPackerOptions = {}): {
	readable: ReadableStream<Uint8Array>;
	controller: ZipPackController;
} {
	const level = options.level ?? DEFAULT_ZIP_LEVEL;

	let streamController!: ReadableStreamDefaultController<Uint8Array>;
	let failure: unknown = null;

	const zip = new Zip((err, data, final) => {
		if (err) {
			fail(err);
			return;
		}
		if (failure !== null) return;

		streamController.enqueue(data);
		if (final) streamController.close();
	});

	const readable = new ReadableStream<Uint8Array>({
		start(controller) {
			streamController = controller;
		},
		cancel(reason) {
			failure = reason ?? new Error("Zip stream was cancelled.");
			zip.terminate();
		},
	});

	function fail(err: unknown): void {
		if (failure !== null) return;
		failure = err;
		zip.terminate();
		streamController.error(err);
	}

	const packController: ZipPackController = {
		add(header: ZipEntryHeader): WritableStream<Uint8Array> {
			const name =
				header.type === "directory" && !header.name.endsWith("/")
					? `${header.name}/`
					: header.name;

			// Only file bodies are worth deflating.
			const entryLevel = header.type === "file" ? (header.level ?? level) : 0;
			const file =
				entryLevel === 0
					? new ZipPassThrough(name)
					: new ZipDeflate(name, { level: entryLevel });

			file.mtime = clampDosDate(header.mtime);
			file.os = ZIP_OS_UNIX;
			file.attrs = externalAttributes(header);
			zip.add(file);

			return new WritableStream<Uint8Array>({
				write(chunk) {
					if (failure !== null) throw failure;
					file.push(chunk);
				},
				close() {
					if (failure !== null) throw failure;
					file.push(new Uint8Array(0), true);
				},
				abort(reason) {
					fail(reason);
				},
			});
		},

		finalize() {
			if (failure !== null) return;
			zip.end();
		},

		error(err: unknown) {
			fail(err);
		},
	};

	return { readable, controller: packController };
}

/**
 * Clamps a modification time into the range a zip header can store.
 * Missing or invalid dates fall back to the current time.
 */
export function clampDosDate(mtime?: Date): Date {
	const time = mtime?.getTime();
	if (time === undefined || Number.isNaN(time)) return new Date();
	if (time < DOS_DATE_MIN) return new Date(DOS_DATE_MIN);
	if (time > DOS_DATE_MAX) return new Date(DOS_DATE_MAX);
	return mtime ?? new Date(time);
}

/**
 * Builds the external attributes field: the Unix mode in the high 16 bits and
 * MS-DOS flags in the low byte.
 */
export function externalAttributes(header: ZipEntryHeader): number {
	let unixMode: number;
	let dosAttributes = 0;

	switch (header.type) {
		case "directory":
			unixMode = S_IFDIR | ((header.mode ?? 0o755) & 0o7777);
			dosAttributes = DOS_ATTR_DIRECTORY;
			break;
		case "symlink":
			unixMode = S_IFLNK | 0o777;
			break;
		default:
			unixMode = S_IFREG | ((header.mode ?? 0o644) & 0o7777);
			break;
	}

	// Multiply rather than shift so the result stays a positive 32-bit value.
	return unixMode * 0x10000 + dosAttributes;
}
