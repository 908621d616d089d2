import { runConversionBenchmarks } from "./convert.bench.ts";
import { generateFixtures } from "./fixtures/generate.ts";

async function main() {
	console.log("Starting benchmark run...");

	await generateFixtures();
	await runConversionBenchmarks();

	console.log("Benchmark run complete.");
}

main().catch((err) => {
	console.error("Benchmark failed:", err);
	process.exit(1);
});
