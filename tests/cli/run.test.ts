import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	APP_VERSION,
	type CliIO,
	reportError,
	reportErrorf,
	runCli,
} from "../../src/cli/run";

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
	const stdout: string[] = [];
	const stderr: string[] = [];
	return {
		stdout,
		stderr,
		out: (line) => stdout.push(line),
		err: (line) => stderr.push(line),
	};
}

describe("cli", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "pfs0-pack-cli-test-"));
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("prints the version", async () => {
		const io = captureIO();

		expect(await runCli(["-v"], io)).toBe(0);
		expect(io.stdout).toEqual([`pfs0-pack v${APP_VERSION}`]);
	});

	it("prints help with usage", async () => {
		const io = captureIO();

		expect(await runCli(["--help"], io)).toBe(0);
		expect(io.stdout[0].startsWith(`pfs0-pack v${APP_VERSION} - `)).toBe(true);
		expect(io.stdout[1].split("\n")[0]).toBe("Usage:");
	});

	it("fails without input files", async () => {
		const io = captureIO();

		expect(await runCli(["-o", path.join(tmpDir, "out.nsp")], io)).toBe(1);
		expect(io.stderr).toEqual(["Error: no input files specified"]);
	});

	it("rejects an invalid buffer size", async () => {
		const io = captureIO();

		expect(await runCli(["--buffer", "abc", "a.nca"], io)).toBe(1);
		expect(io.stderr).toEqual(['Error: invalid buffer size "abc"']);
	});

	it("rejects unknown options", async () => {
		const io = captureIO();

		expect(await runCli(["--nope"], io)).toBe(1);
		expect(io.stderr).toHaveLength(1);
		expect(io.stderr[0].startsWith("Error: ")).toBe(true);
	});

	it("builds an archive from the given files", async () => {
		const io = captureIO();
		const output = path.join(tmpDir, "title.nsp");
		const first = path.join(tmpDir, "b.nca");
		const second = path.join(tmpDir, "a.nca");
		await fs.writeFile(first, "bbb");
		await fs.writeFile(second, "aa");

		expect(
			await runCli(["-o", output, "--buffer", "2", first, second], io),
		).toBe(0);
		expect(io.stdout).toEqual([`Successfully built archive: ${output}`]);
		expect(io.stderr).toEqual([]);

		const archive = await fs.readFile(output);
		expect(archive.length).toBe(85);
		expect(archive.subarray(80).toString()).toBe("aabbb");
	});

	it("reports files that cannot be added", async () => {
		const io = captureIO();
		const missing = path.join(tmpDir, "missing.nca");

		expect(await runCli(["-o", path.join(tmpDir, "out.nsp"), missing], io)).toBe(
			1,
		);
		expect(io.stderr).toEqual([
			`Error: Failed to add files: Failed to add file ${missing}: ENOENT: no such file or directory, stat '${missing}'`,
		]);
	});
});

describe("error reporting", () => {
	it("prints a literal message", () => {
		const io = captureIO();
		reportError(io, "100% broken");

		expect(io.stderr).toEqual(["Error: 100% broken"]);
	});

	it("prints a formatted message", () => {
		const io = captureIO();
		reportErrorf(io, "expected %d bytes, got %d", 3, 5);

		expect(io.stderr).toEqual(["Error: expected 3 bytes, got 5"]);
	});
});
