import * as fs from "node:fs/promises";
import * as path from "node:path";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type ArchiveCodec, defaultCodec } from "../../src/convert/codec";
import { convertArchive, convertDirectory } from "../../src/convert/converter";
import {
	CleanupError,
	CollisionError,
	ExtractionError,
	StagingCreateError,
} from "../../src/convert/errors";
import {
	createTempDir,
	exists,
	readZip,
	silentLogger,
	writeRawTarGz,
	writeTarGz,
} from "../fixtures";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("convertDirectory", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await createTempDir("convert");
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it("converts notes.tar.gz into notes.zip and removes the staging directory", async () => {
		await writeTarGz(path.join(dir, "notes.tar.gz"), { "readme.txt": "hello" });

		const summary = await convertDirectory(dir, { logger: silentLogger });

		expect(summary.failed).toEqual([]);
		expect(summary.warnings).toEqual([]);
		expect(summary.succeeded.map((s) => s.outputPath)).toEqual([
			path.join(dir, "notes.zip"),
		]);
		expect(await readZip(path.join(dir, "notes.zip"))).toEqual({
			"readme.txt": "hello",
		});
		expect(await exists(path.join(dir, "notes_tmp"))).toBe(false);
		expect(await exists(path.join(dir, "notes.tar.gz"))).toBe(true);
	});

	it("keeps the directory structure of the archive", async () => {
		await writeTarGz(path.join(dir, "site.tar.gz"), {
			"index.html": "<h1>hi</h1>",
			"assets/css/main.css": "body {}",
		});

		await convertDirectory(dir, { logger: silentLogger });

		expect(await readZip(path.join(dir, "site.zip"))).toEqual({
			"assets/": "",
			"assets/css/": "",
			"assets/css/main.css": "body {}",
			"index.html": "<h1>hi</h1>",
		});
	});

	it("converts archives and entries with non-ASCII names", async () => {
		await writeRawTarGz(path.join(dir, "caf\u00e9.tar.gz"), [
			{ name: "r\u00e9sum\u00e9.txt", body: "cv" },
		]);

		const summary = await convertDirectory(dir, { logger: silentLogger });

		expect(summary.failed).toEqual([]);
		expect(summary.succeeded.map((s) => s.outputPath)).toEqual([
			path.join(dir, "caf\u00e9.zip"),
		]);
		expect(await readZip(path.join(dir, "caf\u00e9.zip"))).toEqual({
			"r\u00e9sum\u00e9.txt": "cv",
		});
		expect((await fs.readdir(dir)).sort()).toEqual([
			"caf\u00e9.tar.gz",
			"caf\u00e9.zip",
		]);
	});

	it("reports a corrupted archive and converts the others", async () => {
		await writeTarGz(path.join(dir, "A.tar.gz"), { "a.txt": "a" });
		await writeTarGz(path.join(dir, "B.tar.gz"), { "b.txt": "b" });
		await fs.writeFile(path.join(dir, "C.tar.gz"), "not a gzip stream");

		const summary = await convertDirectory(dir, { logger: silentLogger });

		expect(summary.succeeded.map((s) => s.input.name)).toEqual([
			"A.tar.gz",
			"B.tar.gz",
		]);
		expect(summary.failed).toHaveLength(1);

		const [failure] = summary.failed;
		expect(failure.input.name).toBe("C.tar.gz");
		expect(failure.error).toBeInstanceOf(ExtractionError);
		expect(failure.error.kind).toBe("ExtractionError");
		expect(failure.error.archivePath).toBe(path.join(dir, "C.tar.gz"));
		expect(failure.error.message).toBe(
			'Failed to extract "C.tar.gz": incorrect header check',
		);

		expect(await exists(path.join(dir, "C.zip"))).toBe(false);
		expect(await exists(path.join(dir, "C_tmp"))).toBe(false);
		expect(await readZip(path.join(dir, "B.zip"))).toEqual({ "b.txt": "b" });
	});

	it("removes the staging directory after a traversal attempt", async () => {
		await writeRawTarGz(path.join(dir, "evil.tar.gz"), [
			{ name: "../escaped.txt", body: "evil" },
		]);

		const summary = await convertDirectory(dir, { logger: silentLogger });

		expect(summary.failed.map((f) => f.error.kind)).toEqual(["ExtractionError"]);
		expect(await exists(path.join(dir, "evil_tmp"))).toBe(false);
		expect(await exists(path.join(dir, "escaped.txt"))).toBe(false);
		expect(await exists(path.join(dir, "evil.zip"))).toBe(false);
	});

	it("does nothing when there are no archives", async () => {
		await fs.writeFile(path.join(dir, "notes.txt"), "not an archive");

		const summary = await convertDirectory(dir, { logger: silentLogger });

		expect(summary).toEqual({
			succeeded: [],
			failed: [],
			skipped: [],
			warnings: [],
		});
		expect(await fs.readdir(dir)).toEqual(["notes.txt"]);
	});

	it("rejects a missing input directory", async () => {
		await expect(
			convertDirectory(path.join(dir, "missing"), { logger: silentLogger }),
		).rejects.toMatchObject({ code: "ENOENT" });
	});

	describe("collisions", () => {
		beforeEach(async () => {
			await writeTarGz(path.join(dir, "notes.tar.gz"), { "readme.txt": "hello" });
		});

		it("refuses to replace an existing output archive", async () => {
			await fs.writeFile(path.join(dir, "notes.zip"), "old");

			const summary = await convertDirectory(dir, { logger: silentLogger });

			const [failure] = summary.failed;
			expect(failure.error).toBeInstanceOf(CollisionError);
			expect(failure.error.message).toBe(
				`Output archive "${path.join(dir, "notes.zip")}" already exists.`,
			);
			expect(await fs.readFile(path.join(dir, "notes.zip"), "utf8")).toBe("old");
			expect(await exists(path.join(dir, "notes_tmp"))).toBe(false);
		});

		it("replaces an existing output archive when overwriting", async () => {
			await fs.writeFile(path.join(dir, "notes.zip"), "old");

			const summary = await convertDirectory(dir, {
				overwrite: true,
				logger: silentLogger,
			});

			expect(summary.succeeded).toHaveLength(1);
			expect(await readZip(path.join(dir, "notes.zip"))).toEqual({
				"readme.txt": "hello",
			});
		});

		it("leaves a leftover staging directory alone", async () => {
			await fs.mkdir(path.join(dir, "notes_tmp"));
			await fs.writeFile(path.join(dir, "notes_tmp/stale.txt"), "stale");

			const summary = await convertDirectory(dir, { logger: silentLogger });

			const [failure] = summary.failed;
			expect(failure.error).toBeInstanceOf(CollisionError);
			expect(failure.error.message).toBe(
				`Staging directory "${path.join(dir, "notes_tmp")}" already exists.`,
			);
			expect(await exists(path.join(dir, "notes_tmp/stale.txt"))).toBe(true);
			expect(await exists(path.join(dir, "notes.zip"))).toBe(false);
		});

		it("replaces a leftover staging directory when overwriting", async () => {
			await fs.mkdir(path.join(dir, "notes_tmp"));
			await fs.writeFile(path.join(dir, "notes_tmp/stale.txt"), "stale");

			const summary = await convertDirectory(dir, {
				overwrite: true,
				logger: silentLogger,
			});

			expect(summary.succeeded).toHaveLength(1);
			expect(await readZip(path.join(dir, "notes.zip"))).toEqual({
				"readme.txt": "hello",
			});
			expect(await exists(path.join(dir, "notes_tmp"))).toBe(false);
		});

		it("fails to stage when a file has the staging directory's name", async () => {
			await fs.writeFile(path.join(dir, "notes_tmp"), "a file");

			const summary = await convertDirectory(dir, {
				overwrite: true,
				logger: silentLogger,
			});

			const [failure] = summary.failed;
			expect(failure.error).toBeInstanceOf(StagingCreateError);
			expect(failure.error.message).toBe(
				`Staging path "${path.join(dir, "notes_tmp")}" exists and is not a directory.`,
			);
			expect(await fs.readFile(path.join(dir, "notes_tmp"), "utf8")).toBe(
				"a file",
			);
		});

		it("fails the later of two archives sharing a base name", async () => {
			await writeTarGz(path.join(dir, "notes.tgz"), { "other.txt": "other" });

			const summary = await convertDirectory(dir, {
				suffixes: [".tar.gz", ".tgz"],
				logger: silentLogger,
			});

			expect(summary.succeeded.map((s) => s.input.name)).toEqual([
				"notes.tar.gz",
			]);
			const [failure] = summary.failed;
			expect(failure.input.name).toBe("notes.tgz");
			expect(failure.error).toBeInstanceOf(CollisionError);
			expect(failure.error.message).toBe(
				'Base name "notes" of "notes.tgz" is already used by "notes.tar.gz".',
			);
			expect(await readZip(path.join(dir, "notes.zip"))).toEqual({
				"readme.txt": "hello",
			});
		});

		it("converts the first of two archives sharing a base name with failFast", async () => {
			await writeTarGz(path.join(dir, "notes.tgz"), { "other.txt": "other" });

			const summary = await convertDirectory(dir, {
				suffixes: [".tar.gz", ".tgz"],
				failFast: true,
				logger: silentLogger,
			});

			expect(summary.succeeded.map((s) => s.input.name)).toEqual([
				"notes.tar.gz",
			]);
			expect(summary.failed.map((f) => f.input.name)).toEqual(["notes.tgz"]);
			expect(summary.skipped).toEqual([]);
			expect(await readZip(path.join(dir, "notes.zip"))).toEqual({
				"readme.txt": "hello",
			});
		});
	});

	it("writes outputs and staging directories to the configured directories", async () => {
		await writeTarGz(path.join(dir, "notes.tar.gz"), { "readme.txt": "hello" });
		const outputDir = path.join(dir, "out");
		const stagingDir = path.join(dir, "staging");
		const staged: string[] = [];

		const summary = await convertDirectory(dir, {
			outputDir,
			stagingDir,
			logger: silentLogger,
			codec: {
				extractAll: (archive, dest, options) => {
					staged.push(dest);
					return defaultCodec.extractAll(archive, dest, options);
				},
				compressAll: defaultCodec.compressAll,
			},
		});

		expect(summary.succeeded).toHaveLength(1);
		expect(staged).toEqual([path.join(stagingDir, "notes_tmp")]);
		expect(await readZip(path.join(outputDir, "notes.zip"))).toEqual({
			"readme.txt": "hello",
		});
		expect(await fs.readdir(stagingDir)).toEqual([]);
		expect(await exists(path.join(dir, "notes.zip"))).toBe(false);
	});

	describe("scheduling", () => {
		const names = ["a", "b", "c", "d", "e"];
		let inFlight: number;
		let maxInFlight: number;

		// Extracts nothing, but takes a while, so overlapping runs can be counted.
		const slowCodec: ArchiveCodec = {
			async extractAll(archivePath) {
				inFlight++;
				maxInFlight = Math.max(maxInFlight, inFlight);
				await sleep(archivePath.includes("a.tar.gz") ? 60 : 20);
				inFlight--;
			},
			compressAll: defaultCodec.compressAll,
		};

		beforeEach(async () => {
			inFlight = 0;
			maxInFlight = 0;
			for (const name of names) {
				await fs.writeFile(path.join(dir, `${name}.tar.gz`), "");
			}
		});

		it("converts one archive at a time by default", async () => {
			const summary = await convertDirectory(dir, {
				codec: slowCodec,
				logger: silentLogger,
			});

			expect(summary.succeeded).toHaveLength(5);
			expect(maxInFlight).toBe(1);
		});

		it("runs up to `concurrency` conversions at once and keeps results in name order", async () => {
			const summary = await convertDirectory(dir, {
				codec: slowCodec,
				concurrency: 2,
				logger: silentLogger,
			});

			expect(maxInFlight).toBe(2);
			expect(summary.succeeded.map((s) => s.input.baseName)).toEqual(names);
		});

		it("rejects a concurrency below one", async () => {
			await expect(
				convertDirectory(dir, { concurrency: 0, logger: silentLogger }),
			).rejects.toThrow("Concurrency must be a positive integer, got 0.");
		});

		it("skips the remaining archives after a failure with failFast", async () => {
			const failing: ArchiveCodec = {
				async extractAll(archivePath) {
					if (archivePath.endsWith("b.tar.gz")) throw new Error("broken");
				},
				compressAll: defaultCodec.compressAll,
			};

			const summary = await convertDirectory(dir, {
				codec: failing,
				failFast: true,
				logger: silentLogger,
			});

			expect(summary.succeeded.map((s) => s.input.baseName)).toEqual(["a"]);
			expect(summary.failed.map((f) => f.input.baseName)).toEqual(["b"]);
			expect(summary.skipped.map((s) => s.input.baseName)).toEqual([
				"c",
				"d",
				"e",
			]);
		});

		it("skips every archive once the batch is aborted", async () => {
			const controller = new AbortController();
			controller.abort();

			const summary = await convertDirectory(dir, {
				codec: slowCodec,
				signal: controller.signal,
				logger: silentLogger,
			});

			expect(summary.skipped).toHaveLength(5);
			expect(maxInFlight).toBe(0);
		});
	});
});

describe("convertArchive", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await createTempDir("convert-archive");
		await writeTarGz(path.join(dir, "notes.tar.gz"), { "readme.txt": "hello" });
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it("converts an archive given by path next to the input", async () => {
		const result = await convertArchive(path.join(dir, "notes.tar.gz"), {
			logger: silentLogger,
		});

		expect(result.status).toBe("succeeded");
		if (result.status !== "succeeded") return;
		expect(result.outputPath).toBe(path.join(dir, "notes.zip"));
		expect(result.durationMs).toBeGreaterThanOrEqual(0);
	});

	it("throws for a path without a recognized suffix", async () => {
		await expect(
			convertArchive(path.join(dir, "notes.txt"), { logger: silentLogger }),
		).rejects.toThrow(
			`"${path.join(dir, "notes.txt")}" does not end in a recognized archive suffix.`,
		);
	});

	it("reports a failed cleanup as a warning on a successful conversion", async () => {
		const stagingPath = path.join(dir, "notes_tmp");

		const result = await convertArchive(path.join(dir, "notes.tar.gz"), {
			logger: silentLogger,
			removeStaging: async () => {
				throw new Error("EBUSY: resource busy");
			},
		});

		expect(result.status).toBe("succeeded");
		expect(result.warnings).toHaveLength(1);
		expect(result.warnings[0]).toBeInstanceOf(CleanupError);
		expect(result.warnings[0].message).toBe(
			`Failed to remove staging directory "${stagingPath}": EBUSY: resource busy`,
		);
		expect(await readZip(path.join(dir, "notes.zip"))).toEqual({
			"readme.txt": "hello",
		});
	});

	it("keeps the primary error when cleanup also fails", async () => {
		const result = await convertArchive(path.join(dir, "notes.tar.gz"), {
			logger: silentLogger,
			codec: {
				extractAll: async () => {
					throw new Error("disk full");
				},
				compressAll: defaultCodec.compressAll,
			},
			removeStaging: async () => {
				throw new Error("EBUSY: resource busy");
			},
		});

		expect(result.status).toBe("failed");
		if (result.status !== "failed") return;
		expect(result.error.kind).toBe("ExtractionError");
		expect(result.error.message).toBe('Failed to extract "notes.tar.gz": disk full');
		expect(result.warnings.map((w) => w.kind)).toEqual(["CleanupError"]);
	});

	it("reports compression failures and removes the partial output", async () => {
		const result = await convertArchive(path.join(dir, "notes.tar.gz"), {
			logger: silentLogger,
			codec: {
				extractAll: defaultCodec.extractAll,
				compressAll: async (_source, archivePath) => {
					await fs.writeFile(archivePath, "partial");
					await fs.rm(archivePath);
					throw new Error("no space left on device");
				},
			},
		});

		expect(result.status).toBe("failed");
		if (result.status !== "failed") return;
		expect(result.error.kind).toBe("CompressionError");
		expect(result.error.message).toBe(
			'Failed to compress "notes.tar.gz": no space left on device',
		);
		expect(await exists(path.join(dir, "notes_tmp"))).toBe(false);
	});

	it("maps an output that appears during compression to a collision", async () => {
		const result = await convertArchive(path.join(dir, "notes.tar.gz"), {
			logger: silentLogger,
			codec: {
				extractAll: defaultCodec.extractAll,
				compressAll: async (source, archivePath) => {
					await fs.writeFile(archivePath, "raced");
					await defaultCodec.compressAll(source, archivePath, {
						overwrite: false,
					});
				},
			},
		});

		expect(result.status).toBe("failed");
		if (result.status !== "failed") return;
		expect(result.error.kind).toBe("CollisionError");
		expect(await fs.readFile(path.join(dir, "notes.zip"), "utf8")).toBe("raced");
	});

	it("aborts a conversion that exceeds its timeout", async () => {
		const result = await convertArchive(path.join(dir, "notes.tar.gz"), {
			logger: silentLogger,
			timeout: 20,
			codec: {
				extractAll: (_archive, _dest, options) =>
					new Promise<void>((_resolve, reject) => {
						options?.signal?.addEventListener("abort", () =>
							reject(new Error("aborted")),
						);
					}),
				compressAll: defaultCodec.compressAll,
			},
		});

		expect(result.status).toBe("failed");
		if (result.status !== "failed") return;
		expect(result.error.kind).toBe("ExtractionError");
		expect(result.error.message).toBe(
			'Failed to extract "notes.tar.gz": Timed out after 20 ms.',
		);
		expect(await exists(path.join(dir, "notes_tmp"))).toBe(false);
	});

	it("logs each stage through the given logger", async () => {
		const lines: string[] = [];
		const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
		await fs.writeFile(path.join(dir, "broken.tar.gz"), "not a gzip stream");

		await convertArchive(path.join(dir, "notes.tar.gz"), { logger });
		await convertArchive(path.join(dir, "broken.tar.gz"), { logger });

		const records: { level: number; msg: string; archive: string; kind?: string }[] =
			lines.map((line) => JSON.parse(line));
		expect(records.map((r) => [r.level, r.archive, r.msg])).toEqual([
			[20, "notes.tar.gz", "Converting archive"],
			[30, "notes.tar.gz", "Converted archive"],
			[20, "broken.tar.gz", "Converting archive"],
			[50, "broken.tar.gz", "Conversion failed"],
		]);
		expect(records[3].kind).toBe("ExtractionError");
	});
});
