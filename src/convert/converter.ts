import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import pLimit from "p-limit";
import { isErrnoException } from "../fs/path";
import { createLogger, type Logger } from "../logger";
import type { ZipLevel } from "../web/types";
import { type ArchiveCodec, defaultCodec } from "./codec";
import {
	CleanupError,
	CollisionError,
	CompressionError,
	ConversionError,
	describeError,
	ExtractionError,
	StagingCreateError,
} from "./errors";
import { outputFileName, stagingDirName } from "./naming";
import { findArchives, type InputArchive, toInputArchive } from "./scan";

/**
 * Options for converting a single archive.
 */
export interface ConvertOptions {
	/**
	 * Directory the zip archive is written to.
	 *
	 * @default the directory holding the input archive
	 */
	outputDir?: string;
	/**
	 * Directory the `<base>_tmp` staging directory is created in.
	 *
	 * @default the output directory
	 */
	stagingDir?: string;
	/**
	 * Replace an existing output archive and remove a leftover staging
	 * directory instead of failing with a `CollisionError`.
	 *
	 * @default false
	 */
	overwrite?: boolean;
	/** Deflate level of the zip entries. */
	level?: ZipLevel;
	/** Store what symbolic links in the extracted tree point to. */
	dereference?: boolean;
	/** Milliseconds after which extraction or compression is aborted. */
	timeout?: number;
	signal?: AbortSignal;
	/** Recognized input suffixes, when the input is given as a path. */
	suffixes?: readonly string[];
	codec?: ArchiveCodec;
	/** Removes a staging directory. Defaults to a recursive `rm`. */
	removeStaging?: (stagingPath: string) => Promise<void>;
	logger?: Logger;
}

/**
 * Options for converting every archive in a directory.
 */
export interface ConvertDirectoryOptions extends ConvertOptions {
	/**
	 * Maximum number of conversions in flight.
	 *
	 * @default 1
	 */
	concurrency?: number;
	/**
	 * Stop scheduling conversions after the first failure. Archives not yet
	 * started are reported as skipped.
	 *
	 * @default false
	 */
	failFast?: boolean;
}

export interface ConversionSuccess {
	status: "succeeded";
	input: InputArchive;
	outputPath: string;
	/** Cleanup problems that did not affect the output. */
	warnings: CleanupError[];
	durationMs: number;
}

export interface ConversionFailure {
	status: "failed";
	input: InputArchive;
	error: ConversionError;
	warnings: CleanupError[];
}

export interface ConversionSkipped {
	status: "skipped";
	input: InputArchive;
}

export type ConversionResult = ConversionSuccess | ConversionFailure;
export type ConversionOutcome = ConversionResult | ConversionSkipped;

/**
 * Outcome of a batch. Each list is ordered by input file name.
 */
export interface ConversionSummary {
	succeeded: ConversionSuccess[];
	failed: ConversionFailure[];
	skipped: ConversionSkipped[];
	warnings: CleanupError[];
}

type StageErrorClass = new (
	archivePath: string,
	message: string,
	options?: { cause?: unknown },
) => ConversionError;

/**
 * Convert one gzip-compressed tar archive into a zip archive.
 *
 * The archive is extracted into a fresh `<base>_tmp` staging directory, which
 * is compressed into `<base>.zip` and then removed, whatever the outcome.
 * Conversion failures are returned, not thrown; the error's `kind` names the
 * stage that failed.
 *
 * @example
 * ```typescript
 * const result = await convertArchive('exports/notes.tar.gz');
 * if (result.status === 'failed') console.error(result.error.kind);
 * ```
 */
export async function convertArchive(
	archive: InputArchive | string,
	options: ConvertOptions = {},
): Promise<ConversionResult> {
	const input =
		typeof archive === "string"
			? requireInputArchive(archive, options.suffixes)
			: archive;

	const logger = (options.logger ?? createLogger("converter")).child({
		archive: input.name,
	});
	const codec = options.codec ?? defaultCodec;
	const removeStaging = options.removeStaging ?? removeDirectory;
	const overwrite = options.overwrite ?? false;

	const outputDir = path.resolve(options.outputDir ?? path.dirname(input.path));
	const outputPath = path.join(outputDir, outputFileName(input.baseName));
	const stagingPath = path.join(
		path.resolve(options.stagingDir ?? outputDir),
		stagingDirName(input.baseName),
	);

	const startedAt = performance.now();
	const deadline = createDeadline(options.signal, options.timeout);
	const { signal } = deadline;
	const warnings: CleanupError[] = [];
	let stagingCreated = false;
	let failure: ConversionError | undefined;

	logger.debug(
		{ input: input.path, staging: stagingPath, output: outputPath },
		"Converting archive",
	);

	try {
		await runStage(StagingCreateError, input, "Cannot stage", signal, () =>
			checkCollisions(input, stagingPath, outputPath, overwrite),
		);

		await runStage(
			StagingCreateError,
			input,
			"Failed to create staging directory for",
			signal,
			() => createStaging(stagingPath, overwrite),
			{ existsAsCollision: true },
		);
		stagingCreated = true;

		await runStage(ExtractionError, input, "Failed to extract", signal, () =>
			codec.extractAll(input.path, stagingPath, { signal }),
		);

		await runStage(
			CompressionError,
			input,
			"Failed to compress",
			signal,
			async () => {
				await fs.mkdir(outputDir, { recursive: true });
				await codec.compressAll(stagingPath, outputPath, {
					overwrite,
					level: options.level,
					dereference: options.dereference,
					signal,
				});
			},
			{ existsAsCollision: true },
		);
	} catch (err) {
		if (!(err instanceof ConversionError)) throw err;
		failure = err;
	} finally {
		deadline.dispose();

		if (stagingCreated) {
			try {
				await removeStaging(stagingPath);
			} catch (err) {
				const warning = new CleanupError(
					input.path,
					`Failed to remove staging directory "${stagingPath}": ${describeError(err)}`,
					{ cause: err },
				);
				logger.warn({ kind: warning.kind, err }, warning.message);
				warnings.push(warning);
			}
		}
	}

	if (failure) {
		logger.error({ kind: failure.kind, err: failure }, "Conversion failed");
		return { status: "failed", input, error: failure, warnings };
	}

	const durationMs = performance.now() - startedAt;
	logger.info({ output: outputPath, durationMs }, "Converted archive");
	return { status: "succeeded", input, outputPath, warnings, durationMs };
}

/**
 * Convert every archive directly inside `inputDir`.
 *
 * Conversions run in input name order, at most `concurrency` at a time. A
 * failed archive does not stop the others unless `failFast` is set. Two inputs
 * sharing a base name (`a.tar.gz` and `a.tgz`) would write the same outputs, so
 * the later one fails with a `CollisionError`.
 *
 * @example
 * ```typescript
 * const summary = await convertDirectory('exports', { concurrency: 4 });
 * console.log(`${summary.succeeded.length} converted`);
 * ```
 */
export async function convertDirectory(
	inputDir: string,
	options: ConvertDirectoryOptions = {},
): Promise<ConversionSummary> {
	const { concurrency = 1, failFast = false, signal } = options;
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(
			`Concurrency must be a positive integer, got ${concurrency}.`,
		);
	}

	const logger = options.logger ?? createLogger("converter");
	const convertOptions: ConvertOptions = {
		...options,
		outputDir: options.outputDir ?? inputDir,
		logger,
	};

	const inputs: InputArchive[] = [];
	for await (const input of findArchives(inputDir, options.suffixes)) {
		inputs.push(input);
	}

	logger.debug({ inputDir, count: inputs.length }, "Found archives");

	const limit = pLimit(concurrency);
	const owners = new Map<string, InputArchive>();
	let stopped = false;

	const settle = (outcome: ConversionOutcome): ConversionOutcome => {
		if (outcome.status === "failed" && failFast) stopped = true;
		return outcome;
	};

	const pending = inputs.map((input): Promise<ConversionOutcome> => {
		const owner = owners.get(input.baseName);
		if (!owner) owners.set(input.baseName, input);

		// Queued like any other archive, so failFast only skips later inputs.
		return limit(async (): Promise<ConversionOutcome> => {
			if (stopped || signal?.aborted) return { status: "skipped", input };
			if (owner) return settle(duplicateBaseName(input, owner, logger));
			return settle(await convertArchive(input, convertOptions));
		});
	});

	const summary = summarize(await Promise.all(pending));

	logger.info(
		{
			succeeded: summary.succeeded.length,
			failed: summary.failed.length,
			skipped: summary.skipped.length,
			warnings: summary.warnings.length,
		},
		"Finished converting archives",
	);

	return summary;
}

function duplicateBaseName(
	input: InputArchive,
	owner: InputArchive,
	logger: Logger,
): ConversionFailure {
	const error = new CollisionError(
		input.path,
		`Base name "${input.baseName}" of "${input.name}" is already used by "${owner.name}".`,
	);
	logger.error(
		{ archive: input.name, kind: error.kind, err: error },
		"Conversion failed",
	);
	return { status: "failed", input, error, warnings: [] };
}

function summarize(outcomes: ConversionOutcome[]): ConversionSummary {
	const summary: ConversionSummary = {
		succeeded: [],
		failed: [],
		skipped: [],
		warnings: [],
	};

	for (const outcome of outcomes) {
		switch (outcome.status) {
			case "succeeded":
				summary.succeeded.push(outcome);
				summary.warnings.push(...outcome.warnings);
				break;
			case "failed":
				summary.failed.push(outcome);
				summary.warnings.push(...outcome.warnings);
				break;
			case "skipped":
				summary.skipped.push(outcome);
				break;
		}
	}

	return summary;
}

function requireInputArchive(
	archivePath: string,
	suffixes: readonly string[] | undefined,
): InputArchive {
	const input = toInputArchive(archivePath, suffixes);
	if (!input) {
		throw new Error(
			`"${archivePath}" does not end in a recognized archive suffix.`,
		);
	}
	return input;
}

async function runStage(
	StageError: StageErrorClass,
	input: InputArchive,
	description: string,
	signal: AbortSignal | undefined,
	task: () => Promise<void>,
	{ existsAsCollision = false }: { existsAsCollision?: boolean } = {},
): Promise<void> {
	try {
		await task();
	} catch (err) {
		if (err instanceof ConversionError) throw err;

		// An aborted pipeline only says it was aborted; the reason says why.
		const reason = signal?.aborted ? signal.reason : err;
		const ErrorClass: StageErrorClass =
			existsAsCollision && isErrnoException(err) && err.code === "EEXIST"
				? CollisionError
				: StageError;

		throw new ErrorClass(
			input.path,
			`${description} "${input.name}": ${describeError(reason)}`,
			{ cause: err },
		);
	}
}

async function checkCollisions(
	input: InputArchive,
	stagingPath: string,
	outputPath: string,
	overwrite: boolean,
): Promise<void> {
	const staging = await lstatIfExists(stagingPath);

	if (staging && !staging.isDirectory()) {
		throw new StagingCreateError(
			input.path,
			`Staging path "${stagingPath}" exists and is not a directory.`,
		);
	}

	if (overwrite) return;

	if (staging) {
		throw new CollisionError(
			input.path,
			`Staging directory "${stagingPath}" already exists.`,
		);
	}

	if (await lstatIfExists(outputPath)) {
		throw new CollisionError(
			input.path,
			`Output archive "${outputPath}" already exists.`,
		);
	}
}

async function createStaging(
	stagingPath: string,
	overwrite: boolean,
): Promise<void> {
	await fs.mkdir(path.dirname(stagingPath), { recursive: true });
	if (overwrite) await removeDirectory(stagingPath);
	// Not recursive, so a directory created since the collision check fails with EEXIST.
	await fs.mkdir(stagingPath);
}

async function removeDirectory(directoryPath: string): Promise<void> {
	await fs.rm(directoryPath, { recursive: true, force: true });
}

async function lstatIfExists(target: string): Promise<Stats | undefined> {
	try {
		return await fs.lstat(target);
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") return undefined;
		throw err;
	}
}

// Links the caller's signal with a per-archive timeout.
function createDeadline(
	signal: AbortSignal | undefined,
	timeout: number | undefined,
): { signal: AbortSignal | undefined; dispose: () => void } {
	if (timeout === undefined) return { signal, dispose: () => undefined };

	const controller = new AbortController();
	const forward = () => controller.abort(signal?.reason);

	if (signal?.aborted) forward();
	else signal?.addEventListener("abort", forward, { once: true });

	const timer = setTimeout(() => {
		controller.abort(new Error(`Timed out after ${timeout} ms.`));
	}, timeout);

	return {
		signal: controller.signal,
		dispose() {
			clearTimeout(timer);
			signal?.removeEventListener("abort", forward);
		},
	};
}
