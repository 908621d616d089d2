import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import pino from "pino";
import * as tar from "tar";
import { Bench } from "tinybench";
import { convertDirectory, extractTarGz } from "../src/index.ts";
import {
	LARGE_FILES_BATCH,
	NESTED_FILES_BATCH,
	SMALL_FILES_BATCH,
} from "./fixtures/generate.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const TMP_DIR = path.resolve(__dirname, "..", "tmp");
const logger = pino({ level: "silent" });

function createUniqueDir(): string {
	return path.join(
		TMP_DIR,
		`run-${Date.now()}-${Math.random().toString(36).slice(2)}`,
	);
}

export async function runConversionBenchmarks() {
	await fsp.rm(TMP_DIR, { recursive: true, force: true });
	console.log("\nConversion benchmarks...");

	for (const testCase of [
		{ name: "8 archives of 250 x 1KB files", dir: SMALL_FILES_BATCH },
		{ name: "8 archives of 250 x 1KB nested files", dir: NESTED_FILES_BATCH },
		{ name: "8 archives of 2 x 8MB files", dir: LARGE_FILES_BATCH },
	]) {
		const bench = new Bench({
			time: 10000,
			iterations: 10,
			warmupTime: 2000,
			warmupIterations: 2,
		});

		let outputDir: string;
		const hooks = {
			beforeEach() {
				outputDir = createUniqueDir();
			},
			async afterEach() {
				await fsp.rm(outputDir, { recursive: true, force: true });
			},
		};

		for (const concurrency of [1, 4]) {
			bench.add(
				`tgz2zip: Convert ${testCase.name} (concurrency ${concurrency})`,
				async () => {
					const summary = await convertDirectory(testCase.dir, {
						outputDir,
						concurrency,
						logger,
					});
					if (summary.failed.length > 0) {
						throw summary.failed[0].error;
					}
				},
				hooks,
			);
		}

		bench
			.add(
				`tgz2zip: Extract ${testCase.name}`,
				async () => {
					for (const file of await fsp.readdir(testCase.dir)) {
						await extractTarGz(
							path.join(testCase.dir, file),
							path.join(outputDir, file),
						);
					}
				},
				hooks,
			)
			.add(
				`node-tar: Extract ${testCase.name}`,
				async () => {
					for (const file of await fsp.readdir(testCase.dir)) {
						const dest = path.join(outputDir, file);
						await fsp.mkdir(dest, { recursive: true });
						await tar.x({ file: path.join(testCase.dir, file), C: dest });
					}
				},
				hooks,
			);

		await bench.run();
		console.log(`\n--- ${testCase.name} ---`);
		console.table(bench.table());
	}

	await fsp.rm(TMP_DIR, { recursive: true, force: true });
}
