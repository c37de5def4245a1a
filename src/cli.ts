/**
 * untar - extract plain ustar archives.
 *
 *   untar [-C <dir>] [-q] <archive>...
 *
 * Archives are extracted one after another. An archive that cannot be opened
 * or that ends abnormally does not stop the ones after it.
 */

import * as fs from "node:fs/promises";
import { parseArgs } from "node:util";
import { extractArchive } from "./fs/extract.js";
import { createLogger, type Logger } from "./logger.js";

export const USAGE = "Usage: untar [-C <dir>] [-q] <archive>...";

/**
 * Opens and extracts each archive in turn, closing it afterwards.
 * Resolves true when every archive opened and reached its end marker.
 */
export async function untarFiles(
	archivePaths: string[],
	options: { cwd?: string; logger: Logger },
): Promise<boolean> {
	const { cwd, logger } = options;
	let ok = true;

	for (const archivePath of archivePaths) {
		let handle: fs.FileHandle;
		try {
			handle = await fs.open(archivePath, "r");
		} catch {
			logger.error(`Unable to open ${archivePath}`);
			ok = false;
			continue;
		}

		try {
			const result = await extractArchive(
				handle.createReadStream({ autoClose: false }),
				archivePath,
				{ cwd, logger },
			);
			if (result.status !== "done") ok = false;
		} catch (err: unknown) {
			logger.error(
				`Error reading ${archivePath}: ${err instanceof Error ? err.message : String(err)}`,
			);
			ok = false;
		} finally {
			await handle.close();
		}
	}

	return ok;
}

// Returns the process exit code.
export async function main(
	argv: string[],
	logger: Logger = createLogger(),
): Promise<number> {
	let parsed: ReturnType<typeof parseCommandLine>;
	try {
		parsed = parseCommandLine(argv);
	} catch (err: unknown) {
		logger.error(err instanceof Error ? err.message : String(err));
		logger.error(USAGE);
		return 1;
	}

	const { values, positionals } = parsed;

	if (positionals.length === 0) {
		logger.error(USAGE);
		return 1;
	}

	// -q keeps errors but drops progress lines.
	const log: Logger = values.quiet
		? { info: () => {}, error: (message) => logger.error(message) }
		: logger;

	const ok = await untarFiles(positionals, {
		cwd: values.directory,
		logger: log,
	});
	return ok ? 0 : 1;
}

function parseCommandLine(argv: string[]) {
	return parseArgs({
		args: argv,
		options: {
			directory: { type: "string", short: "C" },
			quiet: { type: "boolean", short: "q" },
		},
		allowPositionals: true,
	});
}
