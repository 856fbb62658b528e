import { generatePfsHeader } from "./pack";
import type { PfsEntry, PfsEntryData } from "./types";
import { encoder } from "./utils";

function toBytes(data: PfsEntryData): Uint8Array {
	if (typeof data === "string") return encoder.encode(data);
	if (data instanceof Uint8Array) return data;
	return new Uint8Array(data);
}

/**
 * Packs an array of entries into a single PFS0 archive held in memory.
 *
 * @param entries - Entries with their names and content. Order does not matter; the
 * archive is always laid out in name order.
 * @returns The complete archive.
 * @example
 * ```typescript
 * import { packPfs } from 'pfs0-pack';
 *
 * const archive = packPfs([
 *   { name: "hello.txt", data: "hello" },
 *   { name: "raw.bin", data: new Uint8Array([1, 2, 3]) },
 * ]);
 * ```
 */
export function packPfs(entries: PfsEntry[]): Uint8Array {
	const sized = entries.map((entry) => {
		const bytes = toBytes(entry.data);
		return { name: entry.name, size: bytes.length, bytes };
	});

	const { header, layout } = generatePfsHeader(sized);
	const archive = new Uint8Array(layout.headerSize + layout.payloadSize);

	archive.set(header, 0);
	for (const { info, dataOffset } of layout.entries) {
		archive.set(info.bytes, dataOffset);
	}

	return archive;
}
