import { createReadStream } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import type { PfsLayoutEntry } from "../web/types";
import { PfsError, toPfsError } from "./errors";
import type { ProgressReporter } from "./progress";
import type { FileEntry } from "./types";

export interface CopyEntryOptions {
	/** Path of the archive, used in error messages. */
	outputPath: string;
	bufferSize: number;
	progress?: ProgressReporter;
}

/**
 * Streams one entry's source file into the archive, starting at its `dataOffset`.
 *
 * Chunks are written with explicit positions on the shared output handle, so the
 * handle's own file position is never relied on. The source stream is destroyed
 * before this resolves or rejects.
 *
 * @returns The number of bytes copied, which always equals the entry's size.
 */
export async function copyEntry(
	output: FileHandle,
	entry: PfsLayoutEntry<FileEntry>,
	options: CopyEntryOptions,
): Promise<number> {
	const { sourcePath, size } = entry.info;
	const source = createReadStream(sourcePath, {
		highWaterMark: options.bufferSize,
	});

	let position = entry.dataOffset;
	let copied = 0;

	try {
		for await (const chunk of source) {
			// Without an encoding, fs read streams only ever yield Buffers.
			const data: Buffer = chunk;

			let bytesWritten: number;
			try {
				({ bytesWritten } = await output.write(data, 0, data.length, position));
			} catch (err) {
				throw toPfsError(
					err,
					`Error writing to output file ${options.outputPath}`,
					options.outputPath,
				);
			}

			if (bytesWritten !== data.length) {
				throw new PfsError(
					"ShortWrite",
					`Short write to output file ${options.outputPath}: expected ${data.length} bytes, wrote ${bytesWritten} bytes`,
					{
						path: options.outputPath,
						expected: data.length,
						actual: bytesWritten,
					},
				);
			}

			position += bytesWritten;
			copied += bytesWritten;
			options.progress?.advance(bytesWritten);
		}
	} catch (err) {
		throw toPfsError(err, `Error reading input file ${sourcePath}`, sourcePath);
	} finally {
		source.destroy();
	}

	if (copied !== size) {
		throw new PfsError(
			"SizeMismatch",
			`Size mismatch for file ${sourcePath} during write: expected ${size} bytes, wrote ${copied} bytes`,
			{ path: sourcePath, expected: size, actual: copied },
		);
	}

	return copied;
}
