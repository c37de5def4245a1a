import type { Logger } from "../logger.js";
import type { UntarError } from "../tar/errors.js";

/**
 * Configuration options for extracting an archive to the filesystem.
 */
export interface ExtractOptions {
	/**
	 * Directory entry paths are resolved against.
	 * @default process.cwd()
	 */
	cwd?: string;
	/**
	 * Receives progress and error diagnostics.
	 * @default createLogger("info")
	 */
	logger?: Logger;
	/**
	 * Mode for parent directories created on demand. Directory entries use the mode from their header.
	 * @default 0o755
	 */
	parentMode?: number;
	/**
	 * Write entries whose path leaves `cwd` (through `..` components or an absolute name) where they point.
	 * When false, absolute names are placed under `cwd` and `..` entries are refused.
	 * @default false
	 */
	preservePaths?: boolean;
}

/** Outcome of extracting one archive. */
export interface ExtractResult {
	/** "done" when an end-of-archive block was reached, "aborted" otherwise. */
	status: "done" | "aborted";
	/** Number of entry headers processed, including skipped ones. */
	entries: number;
	/** The condition that aborted extraction. */
	error?: UntarError;
	/** Entry-level failures that extraction continued past. */
	failures: UntarError[];
}

/** A file opened for an entry's payload. */
export interface OutputFile {
	/** Appends `chunk` and resolves with the number of bytes written. */
	write(chunk: Uint8Array): Promise<number>;
	close(): Promise<void>;
}
