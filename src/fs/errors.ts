/**
 * Failure categories reported by the archive builder.
 *
 * - `NotFound` - a source or output path does not exist
 * - `PermissionDenied` - the OS refused access to a source or output path
 * - `EmptyInput` - `build()` was called without any entries
 * - `ShortWrite` - fewer bytes reached the output than were handed to it
 * - `SizeMismatch` - a source file's length changed after it was added
 * - `IOError` - any other read, write or create failure
 * - `InvalidState` - the builder was used again after its build started
 */
export type PfsErrorCode =
	| "NotFound"
	| "PermissionDenied"
	| "EmptyInput"
	| "ShortWrite"
	| "SizeMismatch"
	| "IOError"
	| "InvalidState";

export interface PfsErrorDetails {
	/** File the failure relates to. */
	path?: string;
	/** Number of bytes that should have been written or copied. */
	expected?: number;
	/** Number of bytes that actually were. */
	actual?: number;
	/** Underlying OS error. */
	cause?: unknown;
}

export class PfsError extends Error {
	readonly code: PfsErrorCode;
	readonly path?: string;
	readonly expected?: number;
	readonly actual?: number;

	constructor(
		code: PfsErrorCode,
		message: string,
		details: PfsErrorDetails = {},
	) {
		super(message, { cause: details.cause });
		this.name = "PfsError";
		this.code = code;
		this.path = details.path;
		this.expected = details.expected;
		this.actual = details.actual;
	}
}

function errnoCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return undefined;
}

/**
 * Wraps an OS error into a {@link PfsError}, picking the code from its errno.
 */
export function toPfsError(err: unknown, message: string, path: string): PfsError {
	if (err instanceof PfsError) return err;

	const reason = err instanceof Error ? err.message : String(err);
	const fullMessage = `${message}: ${reason}`;

	switch (errnoCode(err)) {
		case "ENOENT":
		case "ENOTDIR":
			return new PfsError("NotFound", fullMessage, { path, cause: err });
		case "EACCES":
		case "EPERM":
			return new PfsError("PermissionDenied", fullMessage, { path, cause: err });
		default:
			return new PfsError("IOError", fullMessage, { path, cause: err });
	}
}
