import { defineConfig } from "tsdown";

export default defineConfig([
	{
		entry: {
			index: "./src/index.ts",
			cli: "./src/cli/index.ts",
		},
		platform: "node",
		target: "node20",
		dts: true,
		plugins: [
			{
				name: "strip-tsdoc",
				generateBundle(_options, bundle) {
					for (const [fileName, chunk] of Object.entries(bundle)) {
						if (chunk.type === "chunk" && fileName.endsWith(".js")) {
							chunk.code = chunk.code.replace(
								/\n?\s*\/\*\*[\s\S]*?\*\/\s*\n?/g,
								"\n",
							);
						}
					}
				},
			},
		],
	},
]);
