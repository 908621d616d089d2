/** Stage of a conversion that failed. */
export type ConversionErrorKind =
	| "StagingCreateError"
	| "ExtractionError"
	| "CompressionError"
	| "CleanupError"
	| "CollisionError";

/**
 * Base class of every error a conversion reports.
 *
 * Lower layers throw plain errors; the converter wraps them in the subclass
 * matching the stage they came from.
 */
export abstract class ConversionError extends Error {
	abstract readonly kind: ConversionErrorKind;

	constructor(
		/** Input archive the conversion was working on. */
		readonly archivePath: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}

	toJSON(): {
		kind: ConversionErrorKind;
		archivePath: string;
		message: string;
	} {
		return {
			kind: this.kind,
			archivePath: this.archivePath,
			message: this.message,
		};
	}
}

/** The staging directory could not be created. */
export class StagingCreateError extends ConversionError {
	readonly kind = "StagingCreateError";
	override name = "StagingCreateError";
}

/** The input is not a readable gzip-compressed tar archive, or an entry could not be written. */
export class ExtractionError extends ConversionError {
	readonly kind = "ExtractionError";
	override name = "ExtractionError";
}

/** The zip archive could not be written. */
export class CompressionError extends ConversionError {
	readonly kind = "CompressionError";
	override name = "CompressionError";
}

/** The staging directory could not be removed. Reported as a warning. */
export class CleanupError extends ConversionError {
	readonly kind = "CleanupError";
	override name = "CleanupError";
}

/** A staging directory or output archive already exists, or two inputs share a base name. */
export class CollisionError extends ConversionError {
	readonly kind = "CollisionError";
	override name = "CollisionError";
}

/**
 * Describes an unknown thrown value for messages.
 */
export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
