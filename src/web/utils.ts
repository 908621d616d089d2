export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/**
 * Reads a NUL-terminated string from the view.
 */
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	// Find the first NUL byte within the specified size.
	const end = view.indexOf(0, offset);

	// If no NUL found, read the entire size.
	const sliceEnd = end === -1 || end > offset + size ? offset + size : end;
	return decoder.decode(view.subarray(offset, sliceEnd));
}

/**
 * Reads an octal number from the view.
 *
 * Multiplies instead of shifting, since the 12-byte size field holds values
 * past 32 bits.
 */
export function readOctal(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	let value = 0;
	const end = offset + size;

	for (let i = offset; i < end; i++) {
		const charCode = view[i];
		if (charCode === 0) break; // Stop at NUL terminator
		if (charCode === 32) continue; // Ignore whitespace
		value = value * 8 + (charCode - 48); // 48 is ASCII '0'
	}

	return value;
}

/**
 * Reads a numeric field that can be octal or GNU base-256.
 * Only positive values are produced (uid, gid, size, mtime).
 */
export function readNumeric(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	if (view[offset] & 0x80) {
		// The first byte's high bit is the base-256 marker, not part of the value.
		let result = view[offset] & 0x7f;
		for (let i = 1; i < size; i++) {
			result = result * 256 + view[offset + i];
		}
		return result;
	}
	return readOctal(view, offset, size);
}

/**
 * Reads an entire ReadableStream of Uint8Arrays into a single, combined Uint8Array.
 */
export async function streamToBuffer(
	stream: ReadableStream<Uint8Array>,
): Promise<Uint8Array> {
	const chunks: Uint8Array[] = [];
	const reader = stream.getReader();
	let totalLength = 0;

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;

			chunks.push(value);
			totalLength += value.length;
		}

		// Pre-allocate the final buffer.
		const result = new Uint8Array(totalLength);
		let offset = 0;

		for (const chunk of chunks) {
			result.set(chunk, offset);
			offset += chunk.length;
		}

		return result;
	} finally {
		reader.releaseLock();
	}
}
