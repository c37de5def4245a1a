/** Size of a TAR block in bytes. */
export const BLOCK_SIZE = 512;

/** Permissions for parent directories created on demand (rwxr-xr-x). */
export const DEFAULT_DIR_MODE = 0o755;

// Offsets and sizes of fields in a USTAR header block.
// @see https://www.gnu.org/software/tar/manual/html_node/Standard.html

// Name field
export const USTAR_NAME_OFFSET = 0;
export const USTAR_NAME_SIZE = 100;

// Mode field
export const USTAR_MODE_OFFSET = 100;
export const USTAR_MODE_SIZE = 8;

// Size field
export const USTAR_SIZE_OFFSET = 124;
export const USTAR_SIZE_SIZE = 12;

// Checksum field
export const USTAR_CHECKSUM_OFFSET = 148;
export const USTAR_CHECKSUM_SIZE = 8;

// Typeflag field
export const USTAR_TYPEFLAG_OFFSET = 156;

// Magic field
export const USTAR_MAGIC_OFFSET = 257;
export const USTAR_MAGIC_SIZE = 6;

// Prefix field
export const USTAR_PREFIX_OFFSET = 345;
export const USTAR_PREFIX_SIZE = 155;

/** Type flag characters understood by the extractor. */
export const TYPEFLAG = {
	file: "0",
	link: "1",
	symlink: "2",
	"character-device": "3",
	"block-device": "4",
	directory: "5",
	fifo: "6",
} as const;

/** Reverse mapping from flag characters to type names. */
export const FLAGTYPE: Readonly<Partial<Record<string, keyof typeof TYPEFLAG>>> = {
	"0": "file",
	"1": "link",
	"2": "symlink",
	"3": "character-device",
	"4": "block-device",
	"5": "directory",
	"6": "fifo",
};
