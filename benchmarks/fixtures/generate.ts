import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import * as tar from "tar";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const FIXTURES_DIR = path.resolve(__dirname, "..", "data");
const SOURCES_DIR = path.join(FIXTURES_DIR, "sources");

export const SMALL_FILES_BATCH = path.join(FIXTURES_DIR, "small-files");
export const NESTED_FILES_BATCH = path.join(FIXTURES_DIR, "nested-files");
export const LARGE_FILES_BATCH = path.join(FIXTURES_DIR, "large-files");

const ARCHIVES_PER_BATCH = 8;
const SMALL_FILE_COUNT = 250;
const SMALL_FILE_SIZE = 1024; // 1 KB
const LARGE_FILE_COUNT = 2;
const LARGE_FILE_SIZE = 8 * 1024 * 1024; // 8 MB

const NESTED_DIRS = [
	"level1/level2/level3/level4/level5",
	"categories/audio/music",
	"categories/video/movies",
	"archive/2024/01/reports",
	"projects/web-app/src/components",
	"projects/web-app/tests/unit",
	"spaces in names/more spaces here",
	"unicode-测试-🚀-directory/深层目录",
];

async function writeFiles(
	dir: string,
	count: number,
	size: number,
	subdirs: string[] = [""],
): Promise<void> {
	for (const subdir of subdirs) {
		await fs.mkdir(path.join(dir, subdir), { recursive: true });
	}

	// Text-like content, so deflate has something to do.
	const content = Buffer.from(
		"lorem ipsum dolor sit amet ".repeat(Math.ceil(size / 27)).slice(0, size),
	);
	await Promise.all(
		Array.from({ length: count }, (_, i) =>
			fs.writeFile(
				path.join(dir, subdirs[i % subdirs.length], `file-${i}.txt`),
				content,
			),
		),
	);
}

// Packs the source tree into a batch of identical archives.
async function createBatch(sourceDir: string, batchDir: string): Promise<void> {
	await fs.mkdir(batchDir, { recursive: true });
	for (let i = 0; i < ARCHIVES_PER_BATCH; i++) {
		await tar.c(
			{ gzip: true, file: path.join(batchDir, `archive-${i}.tar.gz`), C: sourceDir },
			["."],
		);
	}
}

export async function generateFixtures() {
	console.log("Generating fixtures...");
	await fs.rm(FIXTURES_DIR, { recursive: true, force: true });

	const small = path.join(SOURCES_DIR, "small");
	await writeFiles(small, SMALL_FILE_COUNT, SMALL_FILE_SIZE);
	await createBatch(small, SMALL_FILES_BATCH);

	const nested = path.join(SOURCES_DIR, "nested");
	await writeFiles(nested, SMALL_FILE_COUNT, SMALL_FILE_SIZE, NESTED_DIRS);
	await createBatch(nested, NESTED_FILES_BATCH);

	const large = path.join(SOURCES_DIR, "large");
	await writeFiles(large, LARGE_FILE_COUNT, LARGE_FILE_SIZE);
	await createBatch(large, LARGE_FILES_BATCH);

	await fs.rm(SOURCES_DIR, { recursive: true, force: true });
	console.log("Fixtures generated successfully.");
}
