/**
 * Metadata needed to place one file in a PFS0 archive.
 */
export interface PfsEntryInfo {
	/** Name recorded in the archive's name table. Encoded as UTF-8. */
	name: string;
	/** Size of the entry's payload in bytes. */
	size: number;
}

/**
 * An entry after layout, with its position in the archive resolved.
 */
export interface PfsLayoutEntry<T extends PfsEntryInfo = PfsEntryInfo> {
	/** The entry as it was passed to {@link createPfsLayout}. */
	info: T;
	/** Absolute byte offset of the payload from the start of the archive. */
	dataOffset: number;
	/** Byte offset of the name inside the name table. */
	nameOffset: number;
}

/**
 * The computed shape of a PFS0 header.
 */
export interface PfsLayout<T extends PfsEntryInfo = PfsEntryInfo> {
	/** Entries sorted by name, with offsets assigned. */
	entries: PfsLayoutEntry<T>[];
	/** Byte length of all names including their NUL terminators. */
	nameTableSize: number;
	/** Zero bytes appended after the name table to reach the header alignment. */
	padding: number;
	/** Total header length. Also the absolute offset of the payload region. */
	headerSize: number;
	/** Sum of all payload sizes. */
	payloadSize: number;
}

/**
 * Union type for entry body data that can be packed in memory.
 *
 * - `string` - Text content (encoded as UTF-8)
 * - `Uint8Array` - Binary data
 * - `ArrayBuffer` - Binary data
 */
export type PfsEntryData = string | Uint8Array | ArrayBuffer;

/**
 * A complete entry for in-memory packing with {@link packPfs}.
 */
export interface PfsEntry {
	name: string;
	data: PfsEntryData;
}
