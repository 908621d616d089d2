import * as path from "node:path";
import { parseArgs } from "node:util";
import type { ZodIssue } from "zod";
import { type ConverterConfigInput, converterConfigSchema } from "../config";
import { type ConversionSummary, convertDirectory } from "../convert/converter";
import { describeError } from "../convert/errors";
import {
	createLogger,
	type Logger,
	type LogLevel,
	setLogLevel,
} from "../logger";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

// Level when neither --log-level nor LOG_LEVEL is set.
export const DEFAULT_CLI_LOG_LEVEL: LogLevel = "warn";

export const USAGE = `Usage: tgz2zip [options] [dir]

Convert every .tar.gz archive in dir (default: the current directory) to .zip.

Options:
  -o, --output <dir>       directory to write archives to (default: dir)
      --staging <dir>      directory for <name>_tmp staging directories (default: output)
  -f, --overwrite          replace existing archives and leftover staging directories
  -j, --concurrency <n>    conversions to run at once (default: 1)
  -s, --suffix <suffix>    input suffix to recognize, repeatable (default: .tar.gz)
  -l, --level <0-9>        deflate level (default: 6)
      --timeout <ms>       abort a conversion that takes longer
      --fail-fast          stop starting conversions after the first failure
      --log-level <level>  fatal, error, warn, info, debug, trace or silent (default: warn)
  -h, --help               show this help`;

/** Where the CLI reads its environment and writes its report. */
export interface CliIo {
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	env: NodeJS.ProcessEnv;
	cwd: string;
	signal?: AbortSignal;
	/** Builds the logger for the resolved level. Defaults to the stderr logger. */
	createLogger: (level: LogLevel) => Logger;
}

// Config fields named as the user typed them.
const FLAG_NAMES = new Map<PropertyKey, string>([
	["inputDir", "dir"],
	["outputDir", "--output"],
	["stagingDir", "--staging"],
	["concurrency", "--concurrency"],
	["suffixes", "--suffix"],
	["level", "--level"],
	["timeout", "--timeout"],
	["logLevel", "--log-level"],
]);

/**
 * Runs the command line and resolves to the process exit code: 0 when every
 * archive converted, 1 when any failed or was skipped, 2 on invalid usage.
 */
export async function runCli(
	argv: string[],
	overrides: Partial<CliIo> = {},
): Promise<number> {
	const io: CliIo = {
		stdout: (line) => process.stdout.write(`${line}\n`),
		stderr: (line) => process.stderr.write(`${line}\n`),
		env: process.env,
		cwd: process.cwd(),
		createLogger: createStderrLogger,
		...overrides,
	};

	let parsed: ReturnType<typeof parse>;
	try {
		parsed = parse(argv);
	} catch (err) {
		return usageError(io, [describeError(err)]);
	}

	const { values, positionals } = parsed;

	if (values.help) {
		io.stdout(USAGE);
		return EXIT_OK;
	}

	if (positionals.length > 1) {
		return usageError(io, [
			`Expected at most one directory, got ${positionals.length}.`,
		]);
	}

	const result = converterConfigSchema.safeParse({
		inputDir: positionals[0],
		outputDir: values.output,
		stagingDir: values.staging,
		overwrite: values.overwrite,
		concurrency: toNumber(values.concurrency),
		suffixes: values.suffix,
		level: toNumber(values.level),
		timeout: toNumber(values.timeout),
		failFast: values["fail-fast"],
		logLevel: values["log-level"] ?? io.env.LOG_LEVEL ?? DEFAULT_CLI_LOG_LEVEL,
	} satisfies Record<keyof ConverterConfigInput, unknown>);

	if (!result.success) {
		return usageError(io, result.error.issues.map(formatIssue));
	}

	const config = result.data;
	const logger = io.createLogger(config.logLevel);

	const resolve = (dir: string | undefined) =>
		dir === undefined ? undefined : path.resolve(io.cwd, dir);

	let summary: ConversionSummary;
	try {
		summary = await convertDirectory(path.resolve(io.cwd, config.inputDir), {
			outputDir: resolve(config.outputDir),
			stagingDir: resolve(config.stagingDir),
			overwrite: config.overwrite,
			concurrency: config.concurrency,
			suffixes: config.suffixes,
			level: config.level,
			timeout: config.timeout,
			failFast: config.failFast,
			signal: io.signal,
			logger,
		});
	} catch (err) {
		io.stderr(`tgz2zip: ${describeError(err)}`);
		return EXIT_FAILURE;
	}

	const report = formatSummary(summary);
	for (const line of report.stderr) io.stderr(line);
	for (const line of report.stdout) io.stdout(line);

	return summary.failed.length > 0 || summary.skipped.length > 0
		? EXIT_FAILURE
		: EXIT_OK;
}

/**
 * Renders a summary as report lines: conversions and the closing count line on
 * stdout, failures, skips and warnings on stderr.
 */
export function formatSummary(summary: ConversionSummary): {
	stdout: string[];
	stderr: string[];
} {
	const stdout = summary.succeeded.map(
		({ input, outputPath }) =>
			`converted ${input.name} -> ${path.basename(outputPath)}`,
	);

	const stderr = [
		...summary.failed.map(
			({ input, error }) =>
				`failed ${input.name} [${error.kind}]: ${error.message}`,
		),
		...summary.skipped.map(({ input }) => `skipped ${input.name}`),
		...summary.warnings.map(
			(warning) =>
				`warning ${path.basename(warning.archivePath)} [${warning.kind}]: ${warning.message}`,
		),
	];

	stdout.push(
		`${summary.succeeded.length} converted, ${summary.failed.length} failed, ${summary.skipped.length} skipped, ${summary.warnings.length} warnings`,
	);

	return { stdout, stderr };
}

function createStderrLogger(level: LogLevel): Logger {
	setLogLevel(level);
	return createLogger("cli");
}

function parse(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		strict: true,
		options: {
			output: { type: "string", short: "o" },
			staging: { type: "string" },
			overwrite: { type: "boolean", short: "f" },
			concurrency: { type: "string", short: "j" },
			suffix: { type: "string", short: "s", multiple: true },
			level: { type: "string", short: "l" },
			timeout: { type: "string" },
			"fail-fast": { type: "boolean" },
			"log-level": { type: "string" },
			help: { type: "boolean", short: "h" },
		},
	});
}

function usageError(io: CliIo, messages: string[]): number {
	for (const message of messages) io.stderr(`tgz2zip: ${message}`);
	io.stderr("Run `tgz2zip --help` for usage.");
	return EXIT_USAGE;
}

function formatIssue(issue: ZodIssue): string {
	const name = FLAG_NAMES.get(issue.path[0]);
	return name ? `${name}: ${issue.message}` : issue.message;
}

function toNumber(value: string | undefined): number | undefined {
	return value === undefined ? undefined : Number(value);
}
