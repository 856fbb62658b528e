import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { generatePfsHeader } from "../web/pack";
import type { PfsLayout } from "../web/types";
import { copyEntry } from "./copy";
import { PfsError, toPfsError } from "./errors";
import { assertProgressSettings, ProgressReporter } from "./progress";
import {
	type BuildResult,
	type BuildState,
	DEFAULT_BUFFER_SIZE,
	type FileEntry,
	type PfsBuilderOptions,
} from "./types";

/**
 * Collects input files and writes them into a single PFS0 archive.
 *
 * A builder performs exactly one build. Entries are laid out in name order regardless
 * of the order they were added in.
 *
 * @example
 * ```typescript
 * import { PfsBuilder } from 'pfs0-pack/fs';
 *
 * const builder = new PfsBuilder({ output: 'title.nsp', progress: true });
 * await builder.addFiles(['./program.nca', './meta.cnmt.nca']);
 * await builder.build();
 * ```
 */
export class PfsBuilder {
	readonly output: string;
	readonly bufferSize: number;
	private readonly options: PfsBuilderOptions;
	private files: FileEntry[] = [];
	private current: BuildState = { status: "idle" };
	private laidOut?: PfsLayout<FileEntry>;

	constructor(options: PfsBuilderOptions) {
		const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
		if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
			throw new RangeError(
				`Buffer size must be a positive integer, got ${bufferSize}.`,
			);
		}
		assertProgressSettings(options.progressInterval, options.progressWidth);

		this.options = options;
		this.output = options.output;
		this.bufferSize = bufferSize;
	}

	get state(): BuildState {
		return this.current;
	}

	/** Registered entries, in the order they were added. */
	get entries(): readonly FileEntry[] {
		return this.files;
	}

	/**
	 * The archive layout: entries in name order with their offsets. Only set once
	 * `build()` has computed it, and kept if the build later fails.
	 */
	get layout(): PfsLayout<FileEntry> | undefined {
		return this.laidOut;
	}

	/** Sum of the sizes of all registered entries. */
	get totalSize(): number {
		return this.files.reduce((sum, file) => sum + file.size, 0);
	}

	/**
	 * Registers a file for the archive. Its size is captured now and checked again
	 * when it is copied.
	 */
	async addFile(sourcePath: string): Promise<void> {
		this.assertIdle("add files to");

		let stat: Stats;
		try {
			stat = await fs.stat(sourcePath);
		} catch (err) {
			throw toPfsError(err, `Failed to add file ${sourcePath}`, sourcePath);
		}

		this.files.push({
			sourcePath,
			name: path.basename(sourcePath),
			size: stat.size,
		});
	}

	/**
	 * Registers several files in order, stopping at the first failure. Files added
	 * before the failing one stay registered.
	 */
	async addFiles(sourcePaths: Iterable<string>): Promise<void> {
		for (const sourcePath of sourcePaths) {
			await this.addFile(sourcePath);
		}
	}

	/**
	 * Writes the archive: header first, then every payload at its computed offset.
	 *
	 * On failure the partially written output is left in place.
	 */
	async build(): Promise<BuildResult> {
		this.assertIdle("build");

		if (this.files.length === 0) {
			throw new PfsError("EmptyInput", "No input files provided");
		}

		this.current = { status: "creating" };

		try {
			return await this.write();
		} catch (err) {
			const error = toPfsError(err, `Failed to build ${this.output}`, this.output);
			this.current = { status: "failed", error };
			throw error;
		}
	}

	private async write(): Promise<BuildResult> {
		const { header, layout } = generatePfsHeader(this.files);
		this.laidOut = layout;

		const progress = this.options.progress
			? new ProgressReporter({
					total: layout.payloadSize,
					stream: this.options.progressStream ?? process.stdout,
					interval: this.options.progressInterval,
					width: this.options.progressWidth,
					now: this.options.now,
				})
			: undefined;

		let output: fs.FileHandle;
		try {
			output = await fs.open(this.output, "w");
		} catch (err) {
			throw toPfsError(
				err,
				`Failed to create output file ${this.output}`,
				this.output,
			);
		}

		try {
			let bytesWritten: number;
			try {
				({ bytesWritten } = await output.write(header, 0, header.length, 0));
			} catch (err) {
				throw toPfsError(err, "Failed to write header", this.output);
			}

			if (bytesWritten !== header.length) {
				throw new PfsError(
					"ShortWrite",
					`Size mismatch for file ${this.output} during write: expected ${header.length} bytes, wrote ${bytesWritten} bytes`,
					{ path: this.output, expected: header.length, actual: bytesWritten },
				);
			}
			this.current = { status: "header-written" };

			progress?.log(`Building archive: ${this.output}`);

			for (let i = 0; i < layout.entries.length; i++) {
				const entry = layout.entries[i];
				this.current = { status: "copying", index: i, entry: entry.info };

				progress?.log(
					`Processing (${i + 1}/${layout.entries.length}): ${entry.info.name}`,
				);

				try {
					await copyEntry(output, entry, {
						outputPath: this.output,
						bufferSize: this.bufferSize,
						progress,
					});
				} finally {
					progress?.clear();
				}
			}
		} catch (err) {
			// The failure that stopped the build is the one reported, not a close error.
			await output.close().catch(() => undefined);
			throw err;
		}

		try {
			await output.close();
		} catch (err) {
			throw toPfsError(
				err,
				`Failed to close output file ${this.output}`,
				this.output,
			);
		}

		this.current = { status: "done" };

		return {
			output: this.output,
			headerSize: layout.headerSize,
			totalSize: layout.headerSize + layout.payloadSize,
			entries: layout.entries,
		};
	}

	private assertIdle(action: string): void {
		if (this.current.status !== "idle") {
			throw new PfsError(
				"InvalidState",
				`Cannot ${action} a builder in state "${this.current.status}"`,
				{ path: this.output },
			);
		}
	}
}
