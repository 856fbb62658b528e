import { runBuildBenchmarks } from "./build.bench";
import { generateFixtures } from "./fixtures/generate";

async function main() {
	console.log("Starting benchmark run...");

	await generateFixtures();
	await runBuildBenchmarks();

	console.log("Benchmark run complete.");
}

main().catch((err) => {
	console.error("Benchmark failed:", err);
	process.exit(1);
});
