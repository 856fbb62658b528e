import { format, parseArgs } from "node:util";
import { PfsBuilder } from "../fs/builder";
import { DEFAULT_BUFFER_SIZE } from "../fs/types";

export const APP_NAME = "pfs0-pack";
export const APP_VERSION = "1.0.0";
const APP_DESCRIPTION =
	"Packages files (such as NCA content archives) into a PFS0 archive (such as an NSP).";
const DEFAULT_OUTPUT = "out.nsp";

/**
 * Where the CLI prints. Defaults to the console.
 */
export interface CliIO {
	out: (line: string) => void;
	err: (line: string) => void;
}

const consoleIO: CliIO = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
};

export function reportError(io: CliIO, message: string): void {
	io.err(`Error: ${message}`);
}

export function reportErrorf(io: CliIO, template: string, ...args: unknown[]): void {
	io.err(`Error: ${format(template, ...args)}`);
}

function usage(): string {
	return [
		"Usage:",
		`  ${APP_NAME} -o <output.nsp> [options] file1.nca [file2.nca ...]`,
		"",
		"Options:",
		"  -h, --help           Display help information",
		"  -v, --version        Display version information",
		`  -o, --output <path>  Archive output file name (default: ${DEFAULT_OUTPUT})`,
		`  --buffer <bytes>     Buffer size for file copying operations (default: ${DEFAULT_BUFFER_SIZE})`,
		"  --progress           Show progress bar during archive creation",
	].join("\n");
}

function parseBufferSize(value: string | undefined): number | undefined {
	if (value === undefined) return DEFAULT_BUFFER_SIZE;
	if (!/^\d+$/.test(value)) return undefined;

	const size = Number(value);
	return size > 0 && Number.isSafeInteger(size) ? size : undefined;
}

/**
 * Runs the command line with the given arguments (without the node binary and script).
 *
 * @returns The process exit code.
 */
export async function runCli(
	argv: string[],
	io: CliIO = consoleIO,
): Promise<number> {
	let parsed: ReturnType<typeof parseCliArgs>;
	try {
		parsed = parseCliArgs(argv);
	} catch (err) {
		reportError(io, errorMessage(err));
		io.out(usage());
		return 1;
	}

	const { values, positionals } = parsed;

	if (values.help) {
		io.out(`${APP_NAME} v${APP_VERSION} - ${APP_DESCRIPTION}\n`);
		io.out(usage());
		return 0;
	}

	if (values.version) {
		io.out(`${APP_NAME} v${APP_VERSION}`);
		return 0;
	}

	if (positionals.length === 0) {
		reportError(io, "no input files specified");
		io.out(usage());
		return 1;
	}

	const bufferSize = parseBufferSize(values.buffer);
	if (bufferSize === undefined) {
		reportErrorf(io, "invalid buffer size %j", values.buffer);
		return 1;
	}

	const output = values.output ?? DEFAULT_OUTPUT;
	const builder = new PfsBuilder({
		output,
		bufferSize,
		progress: values.progress ?? false,
	});

	try {
		await builder.addFiles(positionals);
	} catch (err) {
		reportErrorf(io, "Failed to add files: %s", errorMessage(err));
		return 1;
	}

	try {
		await builder.build();
	} catch (err) {
		reportErrorf(io, "Failed to build archive: %s", errorMessage(err));
		return 1;
	}

	io.out(`Successfully built archive: ${output}`);
	return 0;
}

function parseCliArgs(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			help: { type: "boolean", short: "h" },
			version: { type: "boolean", short: "v" },
			output: { type: "string", short: "o" },
			buffer: { type: "string" },
			progress: { type: "boolean" },
		},
	});
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
