import {
	BLOCK_SIZE,
	USTAR_CHECKSUM_OFFSET,
	USTAR_CHECKSUM_SIZE,
} from "./constants.js";
import { parseOctal } from "./utils.js";

// ASCII code for a space character.
const CHECKSUM_SPACE = 32; // ' '

// Validates the checksum of a tar header block.
export function validateChecksum(block: Uint8Array): boolean {
	if (block.length < BLOCK_SIZE) return false;

	const stored = parseOctal(block, USTAR_CHECKSUM_OFFSET, USTAR_CHECKSUM_SIZE);

	let sum = 0;
	for (let i = 0; i < BLOCK_SIZE; i++) {
		// If the byte is part of the checksum field, treat it as a space.
		if (
			i >= USTAR_CHECKSUM_OFFSET &&
			i < USTAR_CHECKSUM_OFFSET + USTAR_CHECKSUM_SIZE
		) {
			sum += CHECKSUM_SPACE;
		} else {
			sum += block[i];
		}
	}

	return stored === sum;
}
