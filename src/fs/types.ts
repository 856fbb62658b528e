import type { PfsLayoutEntry } from "../web/types";

/** Default number of bytes read and written per chunk. */
export const DEFAULT_BUFFER_SIZE = 4096;

/** Default minimum time between two progress renders, in milliseconds. */
export const DEFAULT_PROGRESS_INTERVAL = 100;

/** Default number of cells in the progress bar. */
export const DEFAULT_PROGRESS_WIDTH = 50;

/**
 * Anything progress text can be written to, such as `process.stdout`.
 */
export interface ProgressStream {
	write(chunk: string): unknown;
}

/**
 * Configuration for {@link PfsBuilder}.
 */
export interface PfsBuilderOptions {
	/** Path of the archive to create. An existing file is truncated. */
	output: string;
	/** Bytes per read/write chunk when copying payloads (default: 4096) */
	bufferSize?: number;
	/** Print a progress bar while copying (default: false) */
	progress?: boolean;
	/** Minimum milliseconds between progress renders (default: 100) */
	progressInterval?: number;
	/** Number of cells in the progress bar (default: 50) */
	progressWidth?: number;
	/** Where progress output goes (default: `process.stdout`) */
	progressStream?: ProgressStream;
	/** Clock used to throttle progress renders (default: `Date.now`) */
	now?: () => number;
}

/**
 * A file registered with the builder.
 */
export interface FileEntry {
	/** Where the payload is read from. */
	sourcePath: string;
	/** Base name of `sourcePath`, stored in the archive. */
	name: string;
	/** Size in bytes when the file was added. */
	size: number;
}

/**
 * Where a build currently is.
 *
 * A build moves from `idle` through `creating` (output being opened), `header-written`
 * and one `copying` step per entry to `done`. Any failure once the build has started
 * lands in `failed`.
 */
export type BuildState =
	| { status: "idle" }
	| { status: "creating" }
	| { status: "header-written" }
	| { status: "copying"; index: number; entry: FileEntry }
	| { status: "done" }
	| { status: "failed"; error: Error };

/**
 * Summary of a finished build.
 */
export interface BuildResult {
	output: string;
	headerSize: number;
	/** Header plus every payload. */
	totalSize: number;
	entries: PfsLayoutEntry<FileEntry>[];
}
