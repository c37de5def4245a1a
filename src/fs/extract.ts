import { createLogger, type Logger } from "../logger.js";
import { validateChecksum } from "../tar/checksum.js";
import { BLOCK_SIZE } from "../tar/constants.js";
import { UntarError, UntarErrorCode } from "../tar/errors.js";
import { parseHeader } from "../tar/header.js";
import { createBlockReader } from "../tar/reader.js";
import type { ArchiveSource, UstarEntryType, UstarHeader } from "../tar/types.js";
import { isZeroBlock } from "../tar/utils.js";
import { createMaterializer, type Materializer } from "./materialize.js";
import type { ExtractOptions, ExtractResult, OutputFile } from "./types.js";

// Where an entry's payload goes: an open file, or nowhere.
type PayloadSink =
	| { kind: "file"; name: string; file: OutputFile }
	| { kind: "drain" };

const DRAIN: PayloadSink = { kind: "drain" };

// Entry types that are reported and skipped, with the label used in diagnostics.
const IGNORED: Partial<Record<UstarEntryType, string>> = {
	link: "hardlink",
	symlink: "symlink",
	"character-device": "character device",
	"block-device": "block device",
	fifo: "FIFO",
};

/**
 * Extract a ustar archive onto the filesystem.
 *
 * Blocks are read strictly in sequence: each 512-byte block is read, written
 * and awaited before the next. Directories and regular files are created;
 * links, devices and FIFOs are logged and skipped. Extraction stops at the
 * first all-zero block, on a short read, or on a header checksum mismatch.
 * Failures to create or write a single entry are reported and extraction
 * carries on with the next one.
 *
 * The caller owns `source` and is responsible for closing whatever it reads
 * from. Extracting two archives into overlapping trees at once is not safe.
 *
 * @param source - Decompressed archive bytes, e.g. a Node.js `Readable`
 * @param displayName - Archive name used in diagnostics
 * @param options - Optional extraction configuration
 *
 * @example
 * ```typescript
 * import { createReadStream } from 'node:fs';
 * import { extractArchive } from 'tiny-untar';
 *
 * const result = await extractArchive(createReadStream('project.tar'), 'project.tar', {
 *   cwd: '/output/directory',
 * });
 * if (result.status === 'aborted') console.error(result.error?.message);
 * ```
 */
export async function extractArchive(
	source: ArchiveSource,
	displayName: string,
	options: ExtractOptions = {},
): Promise<ExtractResult> {
	const { cwd = process.cwd(), logger = createLogger(), ...fsOptions } =
		options;

	const failures: UntarError[] = [];
	const report = (error: UntarError) => {
		failures.push(error);
		logger.error(error.message);
	};

	const materializer = createMaterializer({ ...fsOptions, cwd, report });
	const reader = createBlockReader(source);
	const block = new Uint8Array(BLOCK_SIZE);
	let entries = 0;

	const abort = (error: UntarError): ExtractResult => {
		logger.error(error.message);
		return { status: "aborted", entries, error, failures };
	};

	const shortRead = (bytesRead: number) =>
		abort(
			new UntarError(
				`Short read on ${displayName}: expected ${BLOCK_SIZE}, got ${bytesRead}`,
				UntarErrorCode.SHORT_READ,
			),
		);

	// Closes an entry's output, reporting at most one failed write for it.
	// A failed close loses buffered data, so it counts as a failed write.
	const closeSink = async (
		sink: PayloadSink,
		writeFailed = false,
		writeError?: unknown,
	): Promise<void> => {
		if (sink.kind !== "file") return;

		let failed = writeFailed;
		let cause = writeError;
		try {
			await sink.file.close();
		} catch (err: unknown) {
			failed = true;
			cause ??= err;
		}

		if (failed) {
			report(
				new UntarError(`Failed write on ${sink.name}`, UntarErrorCode.WRITE_FAILED, {
					path: sink.name,
					cause,
				}),
			);
		}
	};

	// Writes one payload slice. Resolves to the sink for the next block.
	const writeSlice = async (
		sink: PayloadSink,
		chunk: Uint8Array,
	): Promise<PayloadSink> => {
		if (sink.kind !== "file") return sink;

		let cause: unknown;
		try {
			if ((await sink.file.write(chunk)) === chunk.length) return sink;
		} catch (err: unknown) {
			cause = err;
		}

		await closeSink(sink, true, cause);
		return DRAIN;
	};

	logger.info(`Extracting from ${displayName}`);

	try {
		while (true) {
			const headerRead = await reader.read(block);
			if (headerRead < BLOCK_SIZE) return shortRead(headerRead);

			if (isZeroBlock(block)) {
				logger.info(`End of ${displayName}`);
				return { status: "done", entries, failures };
			}

			if (!validateChecksum(block)) {
				return abort(
					new UntarError(
						`Checksum failure on ${displayName}`,
						UntarErrorCode.INVALID_CHECKSUM,
					),
				);
			}

			const header = parseHeader(block);
			entries++;

			let { remaining, sink } = await dispatch(header, materializer, logger);

			try {
				// Padding is consumed with the last block, so exactly ceil(size / 512) blocks are read.
				while (remaining > 0) {
					const bytesRead = await reader.read(block);
					if (bytesRead < BLOCK_SIZE) return shortRead(bytesRead);

					sink = await writeSlice(
						sink,
						block.subarray(0, Math.min(remaining, BLOCK_SIZE)),
					);
					remaining -= BLOCK_SIZE;
				}
			} finally {
				await closeSink(sink);
			}
		}
	} finally {
		await reader.close();
	}
}

// Acts on a parsed header and returns how much payload follows and where it goes.
async function dispatch(
	header: UstarHeader,
	materializer: Materializer,
	logger: Logger,
): Promise<{ remaining: number; sink: PayloadSink }> {
	const ignored = IGNORED[header.type];
	if (ignored) {
		logger.info(`Ignoring ${ignored} ${header.name}`);
		// Still honour the declared size to stay in step with the stream.
		return { remaining: header.size, sink: DRAIN };
	}

	if (header.type === "directory") {
		logger.info(`Extracting dir ${header.name}`);
		await materializer.createDirectory(header.name, header.mode);
		return { remaining: 0, sink: DRAIN };
	}

	logger.info(`Extracting file ${header.name}`);
	const file = await materializer.createFile(header.name);
	return {
		remaining: header.size,
		sink: file ? { kind: "file", name: header.name, file } : DRAIN,
	};
}
