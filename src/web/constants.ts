/** Magic literal at the start of every PFS0 archive. */
export const PFS0_MAGIC = "PFS0";

/** Size of the fixed header prologue (magic, count, name-table size, reserved). */
export const PROLOGUE_SIZE = 0x10;

/** Size of one record in the entry table. */
export const ENTRY_SIZE = 0x18;

/** The full header, including the name table, is padded to this boundary. */
export const HEADER_ALIGNMENT = 0x10;
export const HEADER_ALIGNMENT_MASK = HEADER_ALIGNMENT - 1;

/** Largest value a u32 header field can hold. */
export const MAX_UINT32 = 0xffffffff;

/** Offsets and sizes of fields in the header prologue.
 *
 * All numeric fields are little-endian.
 */
export const PROLOGUE = {
	magic: { offset: 0x0, size: 4 },
	entryCount: { offset: 0x4, size: 4 },
	nameTableSize: { offset: 0x8, size: 4 },
	reserved: { offset: 0xc, size: 4 },
} as const;

/** Offsets and sizes of fields inside a single entry record. */
export const ENTRY = {
	dataOffset: { offset: 0x0, size: 8 },
	size: { offset: 0x8, size: 8 },
	nameOffset: { offset: 0x10, size: 4 },
	reserved: { offset: 0x14, size: 4 },
} as const;
