export {
	type ArchiveCodec,
	type CompressAllOptions,
	defaultCodec,
	type ExtractAllOptions,
} from "./codec";
export {
	type ConversionFailure,
	type ConversionOutcome,
	type ConversionResult,
	type ConversionSkipped,
	type ConversionSuccess,
	type ConversionSummary,
	type ConvertDirectoryOptions,
	type ConvertOptions,
	convertArchive,
	convertDirectory,
} from "./converter";
export {
	CleanupError,
	CollisionError,
	CompressionError,
	ConversionError,
	type ConversionErrorKind,
	describeError,
	ExtractionError,
	StagingCreateError,
} from "./errors";
export {
	DEFAULT_SUFFIXES,
	deriveBaseName,
	matchSuffix,
	outputFileName,
	stagingDirName,
} from "./naming";
export { findArchives, type InputArchive, toInputArchive } from "./scan";
