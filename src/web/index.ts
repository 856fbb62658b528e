export {
	ENTRY_SIZE,
	HEADER_ALIGNMENT,
	PFS0_MAGIC,
	PROLOGUE_SIZE,
} from "./constants";
export { packPfs } from "./helpers";
export { createPfsLayout } from "./layout";
export { createPfsHeader, generatePfsHeader } from "./pack";
export type {
	PfsEntry,
	PfsEntryData,
	PfsEntryInfo,
	PfsLayout,
	PfsLayoutEntry,
} from "./types";
