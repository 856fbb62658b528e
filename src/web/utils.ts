import { HEADER_ALIGNMENT_MASK, MAX_UINT32 } from "./constants";

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/**
 * Writes a string to the view, truncating if necessary.
 * Assumes the view is zero-filled, so any remaining space is null-padded.
 */
export function writeString(
	view: Uint8Array,
	offset: number,
	size: number,
	value?: string,
) {
	if (value) {
		encoder.encodeInto(value, view.subarray(offset, offset + size));
	}
}

/**
 * Reads a NUL-terminated string from the view.
 */
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	// Find the first NUL byte within the specified size.
	const end = view.indexOf(0, offset);

	// If no NUL found, read the entire size.
	const sliceEnd = end === -1 || end > offset + size ? offset + size : end;
	return decoder.decode(view.subarray(offset, sliceEnd));
}

/**
 * Writes a little-endian u32. Values outside the u32 range throw.
 */
export function writeUint32(view: Uint8Array, offset: number, value: number) {
	if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
		throw new RangeError(`Value ${value} does not fit in a u32 field.`);
	}

	new DataView(view.buffer, view.byteOffset, view.byteLength).setUint32(
		offset,
		value,
		true,
	);
}

/**
 * Writes a little-endian u64 from a safe integer.
 */
export function writeUint64(view: Uint8Array, offset: number, value: number) {
	new DataView(view.buffer, view.byteOffset, view.byteLength).setBigUint64(
		offset,
		BigInt(value),
		true,
	);
}

export function readUint32(view: Uint8Array, offset: number): number {
	return new DataView(view.buffer, view.byteOffset, view.byteLength).getUint32(
		offset,
		true,
	);
}

export function readUint64(view: Uint8Array, offset: number): number {
	return Number(
		new DataView(
			view.buffer,
			view.byteOffset,
			view.byteLength,
		).getBigUint64(offset, true),
	);
}

/**
 * Number of zero bytes needed to pad `size` to the header alignment.
 */
export function alignmentPadding(size: number): number {
	return -size & HEADER_ALIGNMENT_MASK;
}

/**
 * Orders two strings by their UTF-8 bytes, the way the name table is sorted.
 */
export function compareNames(a: string, b: string): number {
	if (a === b) return 0;

	const left = encoder.encode(a);
	const right = encoder.encode(b);
	const length = Math.min(left.length, right.length);

	for (let i = 0; i < length; i++) {
		if (left[i] !== right[i]) return left[i] - right[i];
	}

	return left.length - right.length;
}
