export type {
	DecoderOptions,
	ParsedTarEntry,
	TarEntryType,
	TarHeader,
	ZipEntryHeader,
	ZipLevel,
	ZipPackerOptions,
} from "./types";
export { createTarDecoder } from "./unpack";
export { streamToBuffer } from "./utils";
export {
	clampDosDate,
	createZipPacker,
	type ZipPackController,
} from "./zip";
