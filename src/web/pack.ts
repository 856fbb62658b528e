import {
	ENTRY,
	ENTRY_SIZE,
	PFS0_MAGIC,
	PROLOGUE,
	PROLOGUE_SIZE,
} from "./constants";
import { createPfsLayout } from "./layout";
import type { PfsEntryInfo, PfsLayout } from "./types";
import { encoder, writeString, writeUint32, writeUint64 } from "./utils";

/**
 * Serializes a computed {@link PfsLayout} into the bytes of a PFS0 header.
 *
 * The buffer is zero-filled, so NUL terminators, reserved fields and the trailing
 * alignment padding never have to be written explicitly.
 */
export function createPfsHeader(layout: PfsLayout): Uint8Array {
	const view = new Uint8Array(layout.headerSize);
	const nameTableStart = PROLOGUE_SIZE + layout.entries.length * ENTRY_SIZE;

	writeString(view, PROLOGUE.magic.offset, PROLOGUE.magic.size, PFS0_MAGIC);
	writeUint32(view, PROLOGUE.entryCount.offset, layout.entries.length);

	// The declared name-table size includes the alignment padding.
	writeUint32(
		view,
		PROLOGUE.nameTableSize.offset,
		layout.nameTableSize + layout.padding,
	);

	for (let i = 0; i < layout.entries.length; i++) {
		const { info, dataOffset, nameOffset } = layout.entries[i];
		const record = PROLOGUE_SIZE + i * ENTRY_SIZE;

		// Record offsets are relative to the end of the header.
		writeUint64(
			view,
			record + ENTRY.dataOffset.offset,
			dataOffset - layout.headerSize,
		);
		writeUint64(view, record + ENTRY.size.offset, info.size);
		writeUint32(view, record + ENTRY.nameOffset.offset, nameOffset);

		const nameStart = nameTableStart + nameOffset;
		encoder.encodeInto(info.name, view.subarray(nameStart));
	}

	return view;
}

/**
 * Lays out the given entries and serializes their header in one step.
 *
 * @returns The header bytes and the layout used to produce them. Payloads must be
 * written at each entry's `dataOffset`.
 */
export function generatePfsHeader<T extends PfsEntryInfo>(
	entries: readonly T[],
): { header: Uint8Array; layout: PfsLayout<T> } {
	const layout = createPfsLayout(entries);
	return { header: createPfsHeader(layout), layout };
}
