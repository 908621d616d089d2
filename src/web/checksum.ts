import { USTAR } from "./constants";
import { readOctal } from "./utils";

// ASCII code for a space character.
const CHECKSUM_SPACE = 32;

/**
 * Validates the checksum of a tar header block.
 *
 * The checksum is the sum of all header bytes with the checksum field itself
 * counted as spaces. Some historic writers summed signed bytes, so both sums
 * are accepted.
 */
export function validateChecksum(block: Uint8Array): boolean {
	const storedChecksum = readOctal(
		block,
		USTAR.checksum.offset,
		USTAR.checksum.size,
	);

	const checksumEnd = USTAR.checksum.offset + USTAR.checksum.size;
	let unsignedSum = CHECKSUM_SPACE * USTAR.checksum.size;
	let signedSum = unsignedSum;

	for (let i = 0; i < block.length; i++) {
		if (i >= USTAR.checksum.offset && i < checksumEnd) continue;

		const byte = block[i];
		unsignedSum += byte;
		signedSum += byte > 127 ? byte - 256 : byte;
	}

	return storedChecksum === unsignedSum || storedChecksum === signedSum;
}
