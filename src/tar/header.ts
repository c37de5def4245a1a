import {
	FLAGTYPE,
	USTAR_MAGIC_OFFSET,
	USTAR_MAGIC_SIZE,
	USTAR_MODE_OFFSET,
	USTAR_MODE_SIZE,
	USTAR_NAME_OFFSET,
	USTAR_NAME_SIZE,
	USTAR_PREFIX_OFFSET,
	USTAR_PREFIX_SIZE,
	USTAR_SIZE_OFFSET,
	USTAR_SIZE_SIZE,
	USTAR_TYPEFLAG_OFFSET,
} from "./constants.js";
import type { UstarEntryType, UstarHeader } from "./types.js";
import { parseOctal, readString } from "./utils.js";

// Maps the raw type flag byte to an entry type. NUL and unknown flags are files.
export function toEntryType(flag: number): UstarEntryType {
	return FLAGTYPE[String.fromCharCode(flag)] ?? "file";
}

/**
 * Parses the fields the extractor needs from a 512-byte header block.
 *
 * The checksum is not verified here; see {@link validateChecksum}.
 */
export function parseHeader(block: Uint8Array): UstarHeader {
	let name = readString(block, USTAR_NAME_OFFSET, USTAR_NAME_SIZE);

	// Only standard USTAR (not GNU tar) has valid prefix field for pathnames.
	// GNU tar uses "ustar  " and repurposes prefix for timestamp metadata.
	const magic = readString(block, USTAR_MAGIC_OFFSET, USTAR_MAGIC_SIZE);
	if (magic === "ustar") {
		const prefix = readString(block, USTAR_PREFIX_OFFSET, USTAR_PREFIX_SIZE);
		if (prefix) name = `${prefix}/${name}`;
	}

	return {
		name,
		mode: parseOctal(block, USTAR_MODE_OFFSET, USTAR_MODE_SIZE),
		size: parseOctal(block, USTAR_SIZE_OFFSET, USTAR_SIZE_SIZE),
		type: toEntryType(block[USTAR_TYPEFLAG_OFFSET]),
	};
}
