import {
	ENTRY,
	ENTRY_SIZE,
	PROLOGUE,
	PROLOGUE_SIZE,
} from "../src/web/constants";
import { readString, readUint32, readUint64 } from "../src/web/utils";

export interface ReadRecord {
	name: string;
	/** Offset relative to the end of the header, as stored. */
	relativeOffset: number;
	size: number;
	nameOffset: number;
	data: Uint8Array;
}

export interface ReadArchive {
	magic: string;
	entryCount: number;
	declaredNameTableSize: number;
	headerSize: number;
	records: ReadRecord[];
}

/**
 * Reads an archive back through its header records. Only used to check what the
 * builder produced.
 */
export function readArchive(archive: Uint8Array): ReadArchive {
	const magic = readString(archive, PROLOGUE.magic.offset, PROLOGUE.magic.size);
	const entryCount = readUint32(archive, PROLOGUE.entryCount.offset);
	const declaredNameTableSize = readUint32(
		archive,
		PROLOGUE.nameTableSize.offset,
	);
	const nameTableStart = PROLOGUE_SIZE + entryCount * ENTRY_SIZE;
	const headerSize = nameTableStart + declaredNameTableSize;

	const records: ReadRecord[] = [];
	for (let i = 0; i < entryCount; i++) {
		const record = PROLOGUE_SIZE + i * ENTRY_SIZE;
		const relativeOffset = readUint64(archive, record + ENTRY.dataOffset.offset);
		const size = readUint64(archive, record + ENTRY.size.offset);
		const nameOffset = readUint32(archive, record + ENTRY.nameOffset.offset);
		const nameStart = nameTableStart + nameOffset;

		records.push({
			name: readString(archive, nameStart, headerSize - nameStart),
			relativeOffset,
			size,
			nameOffset,
			data: archive.subarray(
				headerSize + relativeOffset,
				headerSize + relativeOffset + size,
			),
		});
	}

	return { magic, entryCount, declaredNameTableSize, headerSize, records };
}

/** Collects everything written to it, for asserting on progress output. */
export class MemoryStream {
	chunks: string[] = [];

	write(chunk: string): boolean {
		this.chunks.push(chunk);
		return true;
	}

	get text(): string {
		return this.chunks.join("");
	}
}
