import { defineConfig } from "tsdown";

export default defineConfig([
	{
		entry: {
			"web/index": "./src/web/index.ts",
			"fs/index": "./src/fs/index.ts",
			"cli/index": "./src/cli/index.ts",
		},
		platform: "node",
		format: "esm",
		outDir: "dist",
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
