import type { TYPEFLAG } from "./constants.js";

/** Entry kinds distinguished by the header type flag. */
export type UstarEntryType = keyof typeof TYPEFLAG;

/**
 * The header fields the extractor acts on, decoded from one 512-byte block.
 */
export interface UstarHeader {
	/** Entry path, with the USTAR prefix already joined in front when present. */
	name: string;
	/** Unix permission bits from the mode field. */
	mode: number;
	/** Declared payload size in bytes, as stored in the header. */
	size: number;
	/** Entry type. Unknown type flags decode as "file". */
	type: UstarEntryType;
}

/**
 * Any source of archive bytes, read sequentially. Node.js `Readable` streams
 * (including `fs.createReadStream`) satisfy this.
 */
export type ArchiveSource = AsyncIterable<Uint8Array>;
