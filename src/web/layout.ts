import { ENTRY_SIZE, MAX_UINT32, PROLOGUE_SIZE } from "./constants";
import type { PfsEntryInfo, PfsLayout, PfsLayoutEntry } from "./types";
import { alignmentPadding, compareNames, encoder } from "./utils";

/**
 * Computes where every entry lands in a PFS0 archive.
 *
 * Entries are sorted by name (byte-wise), which fixes both the order of the entry
 * table and the order of the payload region. The input array is left untouched.
 *
 * @param entries - Entries to place. Any extra properties are carried through on `info`.
 * @returns The header layout, with payload offsets that start right after the header.
 *
 * @example
 * ```typescript
 * const layout = createPfsLayout([
 *   { name: "b.bin", size: 3 },
 *   { name: "a.bin", size: 2 },
 * ]);
 *
 * layout.headerSize; // 80
 * layout.entries.map((e) => e.dataOffset); // [80, 82]
 * ```
 */
export function createPfsLayout<T extends PfsEntryInfo>(
	entries: readonly T[],
): PfsLayout<T> {
	if (entries.length > MAX_UINT32) {
		throw new RangeError(`Too many entries for a PFS0 header: ${entries.length}.`);
	}

	const sorted = [...entries].sort((a, b) => compareNames(a.name, b.name));

	let nameTableSize = 0;
	for (const entry of sorted) {
		nameTableSize += encoder.encode(entry.name).length + 1; // +1 for NUL terminator
	}

	const unpaddedSize = PROLOGUE_SIZE + sorted.length * ENTRY_SIZE + nameTableSize;
	const padding = alignmentPadding(unpaddedSize);
	const headerSize = unpaddedSize + padding;

	if (nameTableSize + padding > MAX_UINT32) {
		throw new RangeError(
			`Name table of ${nameTableSize} bytes does not fit in a PFS0 header.`,
		);
	}

	const laidOut: PfsLayoutEntry<T>[] = [];
	let relativeOffset = 0;
	let nameOffset = 0;

	for (const info of sorted) {
		laidOut.push({
			info,
			dataOffset: headerSize + relativeOffset,
			nameOffset,
		});

		relativeOffset += info.size;
		nameOffset += encoder.encode(info.name).length + 1;
	}

	return {
		entries: laidOut,
		nameTableSize,
		padding,
		headerSize,
		payloadSize: relativeOffset,
	};
}
