export { PfsBuilder } from "./builder";
export { copyEntry } from "./copy";
export { PfsError, type PfsErrorCode, type PfsErrorDetails } from "./errors";
export { formatSize, ProgressReporter, renderProgressBar } from "./progress";
export {
	type BuildResult,
	type BuildState,
	DEFAULT_BUFFER_SIZE,
	DEFAULT_PROGRESS_INTERVAL,
	DEFAULT_PROGRESS_WIDTH,
	type FileEntry,
	type PfsBuilderOptions,
	type ProgressStream,
} from "./types";
