export const decoder = new TextDecoder();

// ASCII codes bounding the octal digits.
const ASCII_ZERO = 48; // '0'
const ASCII_SEVEN = 55; // '7'

const isOctalDigit = (charCode: number) =>
	charCode >= ASCII_ZERO && charCode <= ASCII_SEVEN;

// Reads a NUL-terminated string from the view.
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	// Find the first NUL byte within the specified size.
	const end = view.indexOf(0, offset);

	// If no NUL found, read the entire size.
	const sliceEnd = end === -1 || end > offset + size ? offset + size : end;
	return decoder.decode(view.subarray(offset, sliceEnd));
}

/**
 * Reads an octal number from a fixed-width header field.
 *
 * Leading bytes that are not octal digits (spaces, NULs) are skipped, then
 * digits are accumulated until the first non-digit or the end of the field.
 * A field without any digits reads as 0. Producers disagree on whether these
 * fields end in a space or a NUL, so neither is treated as an error.
 */
export function parseOctal(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	const end = Math.min(offset + size, view.length);
	let i = offset;

	while (i < end && !isOctalDigit(view[i])) i++;

	// Multiply rather than shift: the size field can exceed 32 bits.
	let value = 0;
	for (; i < end && isOctalDigit(view[i]); i++) {
		value = value * 8 + (view[i] - ASCII_ZERO);
	}

	return value;
}

// Instead of checking each byte individually (512 iterations), we can check
// 8 bytes at a time using BigUint64Array (64 iterations).
export function isZeroBlock(block: Uint8Array): boolean {
	// If the block's offset within its underlying buffer is 8-byte aligned, we can safely
	// use BigUint64Array for a fast path check.
	if (block.byteOffset % 8 === 0 && block.length % 8 === 0) {
		const view = new BigUint64Array(
			block.buffer,
			block.byteOffset,
			block.length / 8,
		);

		for (let i = 0; i < view.length; i++) {
			if (view[i] !== 0n) return false;
		}

		return true;
	}

	for (let i = 0; i < block.length; i++) {
		if (block[i] !== 0) return false;
	}

	return true;
}
