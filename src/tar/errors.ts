/**
 * Error codes for conditions met while extracting an archive.
 *
 * Short reads and checksum failures end extraction of the current archive.
 * The remaining codes only affect the entry they were raised for.
 */
export const UntarErrorCode = {
	/** The stream ended inside a header or payload block. */
	SHORT_READ: "UNTAR_SHORT_READ",
	/** Header checksum mismatch; the stream is out of step or not a tar archive. */
	INVALID_CHECKSUM: "UNTAR_INVALID_CHECKSUM",
	MKDIR_FAILED: "UNTAR_MKDIR_FAILED",
	CREATE_FAILED: "UNTAR_CREATE_FAILED",
	WRITE_FAILED: "UNTAR_WRITE_FAILED",
	/** Entry path resolves outside the target directory. */
	OUTSIDE_TARGET: "UNTAR_OUTSIDE_TARGET",
} as const;

export type UntarErrorCode =
	(typeof UntarErrorCode)[keyof typeof UntarErrorCode];

/**
 * Error carrying an {@link UntarErrorCode} and, where one applies, the entry
 * path it concerns.
 */
export class UntarError extends Error {
	readonly code: UntarErrorCode;
	readonly path?: string;

	constructor(
		message: string,
		code: UntarErrorCode,
		options: { path?: string; cause?: unknown } = {},
	) {
		super(message, { cause: options.cause });
		this.name = "UntarError";
		this.code = code;
		this.path = options.path;
	}
}
