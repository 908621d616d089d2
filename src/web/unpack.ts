import { validateChecksum } from "./checksum";
import { BLOCK_SIZE, FLAGTYPE, USTAR } from "./constants";
import type {
	DecoderOptions,
	ParsedTarEntry,
	TarEntryType,
	TarHeader,
} from "./types";
import { decoder, readNumeric, readOctal, readString } from "./utils";

const BODYLESS_TYPES: ReadonlySet<TarEntryType> = new Set<TarEntryType>([
	"link",
	"symlink",
	"character-device",
	"block-device",
	"fifo",
]);

interface InternalTarHeader extends TarHeader {
	magic: string;
	prefix: string;
}

type HeaderOverrides = Omit<Partial<TarHeader>, "mtime"> & {
	// PAX mtime is a float, handle it as a number before converting to Date
	mtime?: number;
};

/**
 * Create a transform stream that parses tar bytes into entries.
 *
 * Each entry's body must be read to the end (or cancelled) before the next
 * entry is pulled, since bodies are forwarded from the same byte queue.
 *
 * @param options - Optional configuration for the decoder using {@link DecoderOptions}.
 * @returns `TransformStream` that converts tar archive bytes to {@link ParsedTarEntry} objects.
 * @example
 * ```typescript
 * import { createReadStream } from "node:fs";
 * import { Readable } from "node:stream";
 * import { createGunzip } from "node:zlib";
 * import { createTarDecoder } from "tgz2zip";
 *
 * const bytes = Readable.toWeb(createReadStream("notes.tar.gz").pipe(createGunzip()));
 * const entries = bytes.pipeThrough(createTarDecoder());
 *
 * for await (const entry of entries) {
 *   console.log(`Entry: ${entry.header.name}`);
 *   await entry.body.cancel();
 * }
 * ```
 */
export function createTarDecoder(
	options: DecoderOptions = {},
): TransformStream<Uint8Array, ParsedTarEntry> {
	const strict = options.strict ?? true;

	// Chunk queue
	const chunks: Uint8Array[] = [];
	let totalLength = 0;
	let offset = 0; // Read offset within the first chunk only

	// State for entries
	let currentEntry: {
		header: TarHeader;
		bytesLeft: number;
		controller: ReadableStreamDefaultController<Uint8Array>;
		// The consumer cancelled the body; remaining bytes are discarded.
		cancelled: boolean;
	} | null = null;
	let paxGlobals: HeaderOverrides = {};
	let nextEntryOverrides: HeaderOverrides = {};

	// Set once the two zero blocks marking the end of the archive were read.
	let ended = false;

	/**
	 * Reads and consumes a specific number of bytes from the chunk queue.
	 * Returns a single Uint8Array with the data, or null if not enough data is available.
	 */
	function consume(size: number): Uint8Array | null {
		if (totalLength < size) {
			return null;
		}
		if (size === 0) {
			return new Uint8Array(0);
		}

		totalLength -= size;

		const firstChunk = chunks[0];

		// Fast path: The entire data block is within the first chunk.
		if (firstChunk.length - offset >= size) {
			const data = firstChunk.slice(offset, offset + size);
			offset += size;

			if (offset === firstChunk.length) {
				chunks.shift();
				offset = 0;
			}

			return data;
		}

		// Slow path: The data spans multiple chunks.
		const data = new Uint8Array(size);
		let bytesCopied = 0;

		while (bytesCopied < size) {
			const chunk = chunks[0];
			const bytesToCopy = Math.min(size - bytesCopied, chunk.length - offset);

			data.set(chunk.subarray(offset, offset + bytesToCopy), bytesCopied);
			bytesCopied += bytesToCopy;
			offset += bytesToCopy;

			if (offset === chunk.length) {
				chunks.shift();
				offset = 0;
			}
		}

		return data;
	}

	/**
	 * Forwards up to the remaining body bytes of the current entry from the
	 * chunk queue directly to its body stream. Returns the number of bytes consumed.
	 */
	function forward(entry: NonNullable<typeof currentEntry>): number {
		const bytesToForward = Math.min(entry.bytesLeft, totalLength);
		let forwarded = 0;

		while (forwarded < bytesToForward && chunks.length > 0) {
			const firstChunk = chunks[0];
			const availableInChunk = firstChunk.length - offset;
			const bytesToSend = Math.min(
				bytesToForward - forwarded,
				availableInChunk,
			);

			if (!entry.cancelled) {
				entry.controller.enqueue(
					firstChunk.subarray(offset, offset + bytesToSend),
				);
			}
			forwarded += bytesToSend;
			offset += bytesToSend;

			if (offset === firstChunk.length) {
				chunks.shift();
				offset = 0;
			}
		}

		totalLength -= forwarded;
		return forwarded;
	}

	/**
	 * Puts data back at the front of the chunk queue.
	 */
	function unshift(data: Uint8Array): void {
		if (offset > 0) {
			chunks[0] = chunks[0].subarray(offset);
			offset = 0;
		}
		chunks.unshift(data);
		totalLength += data.length;
	}

	/**
	 * Whether anything left in the queue is non-zero.
	 */
	function hasTrailingData(): boolean {
		for (let i = 0; i < chunks.length; i++) {
			const chunk = i === 0 ? chunks[i].subarray(offset) : chunks[i];
			if (chunk.some((b) => b !== 0)) return true;
		}
		return false;
	}

	function clearQueue(): void {
		chunks.length = 0;
		totalLength = 0;
		offset = 0;
	}

	// An open entry body would otherwise never settle for its reader.
	function failCurrentEntry(error: unknown): void {
		if (!currentEntry) return;
		if (!currentEntry.cancelled) currentEntry.controller.error(error);
		currentEntry = null;
	}

	function drain(
		controller: TransformStreamDefaultController<ParsedTarEntry>,
	): void {
		while (true) {
			// Read an entry's body.
			if (currentEntry) {
				currentEntry.bytesLeft -= forward(currentEntry);

				if (currentEntry.bytesLeft > 0) break;

				// Skip the padding up to the next block boundary.
				if (consume(paddingFor(currentEntry.header.size)) === null) break;

				if (!currentEntry.cancelled) currentEntry.controller.close();
				currentEntry = null;
			}

			const headerBlock = consume(BLOCK_SIZE);
			if (headerBlock === null) break;

			// Two consecutive zero blocks mark the end of the archive.
			if (headerBlock.every((b) => b === 0)) {
				const nextBlock = consume(BLOCK_SIZE);
				if (nextBlock === null) {
					unshift(headerBlock);
					break;
				}

				if (nextBlock.every((b) => b === 0)) {
					ended = true;
					if (strict && hasTrailingData()) {
						throw new Error("Invalid EOF.");
					}
					clearQueue();
					return;
				}

				if (strict) {
					throw new Error("Unexpected zero block inside tar archive.");
				}

				// Skip the lone zero block and keep reading.
				unshift(nextBlock);
				continue;
			}

			// First parse USTAR headers as a base. Extension headers will override this as needed.
			const header = parseUstarHeader(headerBlock, strict);

			const metaParser = getMetaParser(header.type);
			if (metaParser) {
				const dataSize = header.size;
				const dataBlocksSize = dataSize + paddingFor(dataSize);

				if (totalLength < dataBlocksSize) {
					// Not enough data for the meta content, put the header back.
					unshift(headerBlock);
					break;
				}

				const data = consume(dataBlocksSize);
				if (data === null) {
					unshift(headerBlock);
					break;
				}

				const overrides = metaParser(data.subarray(0, dataSize));
				if (header.type === "pax-global-header") {
					paxGlobals = Object.assign({}, paxGlobals, overrides);
				} else {
					// gnu-long-name, gnu-long-link-name, and pax-header all apply to the next entry
					nextEntryOverrides = Object.assign(
						{},
						nextEntryOverrides,
						overrides,
					);
				}

				continue;
			}

			// Only apply the prefix if the name wasn't overridden by PAX/GNU.
			if (
				header.prefix &&
				header.magic === "ustar" &&
				!nextEntryOverrides.name &&
				!paxGlobals.name
			) {
				header.name = `${header.prefix}/${header.name}`;
			}

			const finalHeader: TarHeader = {
				name: header.name,
				size: header.size,
				mtime: header.mtime,
				mode: header.mode,
				type: header.type,
				uid: header.uid,
				gid: header.gid,
				uname: header.uname,
				gname: header.gname,
				linkname: header.linkname,
			};

			applyOverrides(finalHeader, paxGlobals);
			applyOverrides(finalHeader, nextEntryOverrides);
			nextEntryOverrides = {};

			// Links and special files never carry data blocks.
			if (BODYLESS_TYPES.has(finalHeader.type)) {
				finalHeader.size = 0;
			}

			let bodyController!: ReadableStreamDefaultController<Uint8Array>;
			const body = new ReadableStream<Uint8Array>({
				start(c) {
					bodyController = c;
				},
				cancel() {
					entry.cancelled = true;
				},
			});

			const entry = {
				header: finalHeader,
				bytesLeft: finalHeader.size,
				controller: bodyController,
				cancelled: false,
			};

			controller.enqueue({ header: finalHeader, body });

			if (finalHeader.size > 0) {
				currentEntry = entry;
			} else {
				bodyController.close();
			}
		}
	}

	return new TransformStream<Uint8Array, ParsedTarEntry>({
		transform(chunk, controller) {
			if (ended) {
				if (strict && chunk.some((b) => b !== 0)) {
					throw new Error("Invalid EOF.");
				}
				return;
			}

			chunks.push(chunk);
			totalLength += chunk.length;

			try {
				drain(controller);
			} catch (err) {
				failCurrentEntry(err);
				throw err;
			}
		},

		flush() {
			if (currentEntry) {
				const error = new Error("Tar archive is truncated.");
				if (strict) {
					failCurrentEntry(error);
					throw error;
				}

				if (!currentEntry.cancelled) currentEntry.controller.close();
				currentEntry = null;
			}

			// Any leftover data must be zeroes (padding).
			if (strict && !ended && hasTrailingData()) {
				throw new Error("Tar archive is truncated.");
			}
		},
	});
}

// Bytes needed to round a body up to the next block. Sizes may exceed 32 bits.
function paddingFor(size: number): number {
	return (BLOCK_SIZE - (size % BLOCK_SIZE)) % BLOCK_SIZE;
}

// Parses a 512-byte block into a USTAR header object.
function parseUstarHeader(
	block: Uint8Array,
	strict: boolean,
): InternalTarHeader {
	if (strict && !validateChecksum(block)) {
		throw new Error("Invalid tar header checksum.");
	}

	const magic = readString(block, USTAR.magic.offset, USTAR.magic.size);
	// POSIX writes "ustar\0", old GNU tar writes "ustar  \0".
	if (strict && magic !== "ustar" && magic !== "ustar ") {
		throw new Error(`Invalid USTAR magic literal. Got "${magic}".`);
	}

	const typeflag = readString(block, USTAR.typeflag.offset, USTAR.typeflag.size);

	return {
		name: readString(block, USTAR.name.offset, USTAR.name.size),
		mode: readOctal(block, USTAR.mode.offset, USTAR.mode.size) & 0o7777,
		uid: readNumeric(block, USTAR.uid.offset, USTAR.uid.size),
		gid: readNumeric(block, USTAR.gid.offset, USTAR.gid.size),
		size: readNumeric(block, USTAR.size.offset, USTAR.size.size),
		mtime: new Date(
			readNumeric(block, USTAR.mtime.offset, USTAR.mtime.size) * 1000,
		),
		type: toEntryType(typeflag),
		linkname: readString(block, USTAR.linkname.offset, USTAR.linkname.size),
		magic,
		uname: readString(block, USTAR.uname.offset, USTAR.uname.size),
		gname: readString(block, USTAR.gname.offset, USTAR.gname.size),
		prefix: readString(block, USTAR.prefix.offset, USTAR.prefix.size),
	};
}

// Unknown vendor type flags are read as regular files.
function toEntryType(typeflag: string): TarEntryType {
	return Object.hasOwn(FLAGTYPE, typeflag) ? FLAGTYPE[typeflag] : "file";
}

// Parses PAX record data into an overrides object.
function parsePax(buffer: Uint8Array): HeaderOverrides {
	const overrides: HeaderOverrides = {};
	const pax: Record<string, string> = {};
	let offset = 0;

	while (offset < buffer.length) {
		// The record length is the decimal number before the first space.
		const spaceIndex = buffer.indexOf(32, offset);
		if (spaceIndex === -1) break;

		const length = Number.parseInt(
			decoder.decode(buffer.subarray(offset, spaceIndex)),
			10,
		);
		if (Number.isNaN(length) || length <= 0) break;

		const recordEnd = offset + length;
		// Drop the trailing newline of the record.
		const recordStr = decoder.decode(
			buffer.subarray(spaceIndex + 1, recordEnd - 1),
		);

		// Split at the first '='; values may contain more of them.
		const separator = recordStr.indexOf("=");
		if (separator > 0) {
			const key = recordStr.slice(0, separator);
			const value = recordStr.slice(separator + 1);
			pax[key] = value;

			switch (key) {
				case "path":
					overrides.name = value;
					break;
				case "linkpath":
					overrides.linkname = value;
					break;
				case "size":
					overrides.size = Number.parseInt(value, 10);
					break;
				case "mtime":
					overrides.mtime = Number.parseFloat(value);
					break;
				case "uid":
					overrides.uid = Number.parseInt(value, 10);
					break;
				case "gid":
					overrides.gid = Number.parseInt(value, 10);
					break;
				case "uname":
					overrides.uname = value;
					break;
				case "gname":
					overrides.gname = value;
					break;
			}
		}

		offset = recordEnd;
	}

	if (Object.keys(pax).length > 0) overrides.pax = pax;

	return overrides;
}

// Applies header extension overrides to a parsed USTAR header.
function applyOverrides(header: TarHeader, overrides: HeaderOverrides) {
	if (overrides.name !== undefined) header.name = overrides.name;
	if (overrides.linkname !== undefined) header.linkname = overrides.linkname;
	if (overrides.size !== undefined) header.size = overrides.size;
	if (overrides.mtime !== undefined)
		header.mtime = new Date(overrides.mtime * 1000);
	if (overrides.uid !== undefined) header.uid = overrides.uid;
	if (overrides.gid !== undefined) header.gid = overrides.gid;
	if (overrides.uname !== undefined) header.uname = overrides.uname;
	if (overrides.gname !== undefined) header.gname = overrides.gname;
	if (overrides.pax)
		header.pax = Object.assign({}, header.pax ?? {}, overrides.pax);
}

// A map of meta-header types to their respective data parsers.
function getMetaParser(
	type: TarEntryType,
): ((data: Uint8Array) => HeaderOverrides) | undefined {
	switch (type) {
		case "pax-global-header":
		case "pax-header":
			return parsePax;
		case "gnu-long-name":
			return (data) => ({
				name: readString(data, 0, data.length),
			});
		case "gnu-long-link-name":
			return (data) => ({
				linkname: readString(data, 0, data.length),
			});
		default:
			return undefined;
	}
}
