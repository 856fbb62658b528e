import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { Bench } from "tinybench";
import { PfsBuilder } from "../src/fs";
import {
	LARGE_FILES_DIR,
	listFixture,
	SMALL_FILES_DIR,
} from "./fixtures/generate";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const TMP_DIR = path.resolve(__dirname, "tmp");
const ARCHIVES_DIR = path.join(TMP_DIR, "archives");

async function setup() {
	await fsp.rm(TMP_DIR, { recursive: true, force: true });
	await fsp.mkdir(ARCHIVES_DIR, { recursive: true });
}

async function teardown() {
	await fsp.rm(TMP_DIR, { recursive: true, force: true });
}

function createUniqueArchivePath(): string {
	return path.join(
		ARCHIVES_DIR,
		`build-${Date.now()}-${Math.random().toString(36).slice(2)}.nsp`,
	);
}

export async function runBuildBenchmarks() {
	await setup();
	console.log("\nBuild benchmarks...");

	for (const testCase of [
		{ name: "Many Small Files (2500 x 1KB)", dir: SMALL_FILES_DIR },
		{ name: "Few Large Files (5 x 20MB)", dir: LARGE_FILES_DIR },
	]) {
		const files = await listFixture(testCase.dir);
		const bench = new Bench({
			time: 15000,
			iterations: 30,
			warmupTime: 5000,
			warmupIterations: 10,
		});

		let uniqueArchivePath: string;

		for (const bufferSize of [4096, 64 * 1024, 1024 * 1024]) {
			bench.add(
				`pfs0-pack: Build ${testCase.name}, ${bufferSize / 1024}KB buffer`,
				async () => {
					const builder = new PfsBuilder({
						output: uniqueArchivePath,
						bufferSize,
					});
					await builder.addFiles(files);
					await builder.build();
				},
				{
					beforeEach() {
						uniqueArchivePath = createUniqueArchivePath();
					},
					async afterEach() {
						await fsp.rm(uniqueArchivePath, { force: true });
					},
				},
			);
		}

		await bench.run();
		console.log(`\n--- ${testCase.name} ---`);
		console.table(bench.table());
	}

	await teardown();
}
