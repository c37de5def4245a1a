import * as fs from "node:fs/promises";
import { DEFAULT_DIR_MODE } from "../tar/constants.js";
import { UntarError, UntarErrorCode } from "../tar/errors.js";
import {
	isWithinBounds,
	parentName,
	resolveEntryPath,
	stripTrailingSlashes,
} from "./path.js";
import type { OutputFile } from "./types.js";

export interface MaterializerOptions {
	/** Directory entry names are resolved against. */
	cwd: string;
	/** Mode for parent directories created on demand. */
	parentMode?: number;
	preservePaths?: boolean;
	/** Receives every entry-level failure. */
	report: (error: UntarError) => void;
}

/** Creates the directories and files named by archive entries. */
export interface Materializer {
	/**
	 * Creates a directory, creating missing parents with the parent mode.
	 * Resolves false after reporting when the directory could not be created.
	 */
	createDirectory(name: string, mode: number): Promise<boolean>;
	/**
	 * Opens a file for writing, truncating any existing one, creating its parent
	 * directory if the first attempt fails. Resolves null after reporting when
	 * the file could not be opened.
	 */
	createFile(name: string): Promise<OutputFile | null>;
}

function toOutputFile(handle: fs.FileHandle): OutputFile {
	return {
		async write(chunk) {
			const { bytesWritten } = await handle.write(chunk, 0, chunk.length);
			return bytesWritten;
		},
		close: () => handle.close(),
	};
}

export function createMaterializer(options: MaterializerOptions): Materializer {
	const {
		cwd,
		parentMode = DEFAULT_DIR_MODE,
		preservePaths = false,
		report,
	} = options;

	const resolve = (name: string) =>
		resolveEntryPath(cwd, name, preservePaths);

	// Refuses entries that would land outside the destination directory.
	const checkBounds = (name: string, target: string): boolean => {
		if (preservePaths || isWithinBounds(target, cwd)) return true;

		report(
			new UntarError(
				`Refusing to extract ${name} outside the target directory`,
				UntarErrorCode.OUTSIDE_TARGET,
				{ path: name },
			),
		);
		return false;
	};

	// A directory that is already there counts as created.
	const tryMkdir = async (target: string, mode: number): Promise<boolean> => {
		try {
			await fs.mkdir(target, { mode });
			return true;
		} catch (err: unknown) {
			if ((err as NodeJS.ErrnoException).code !== "EEXIST") return false;

			const stat = await fs.stat(target).catch(() => null);
			return stat?.isDirectory() ?? false;
		}
	};

	const tryOpen = async (target: string): Promise<fs.FileHandle | Error> => {
		try {
			return await fs.open(target, "w");
		} catch (err: unknown) {
			return err instanceof Error ? err : new Error(String(err));
		}
	};

	// Tries the directory itself, then its parent chain one level at a time.
	const makeDirectory = async (name: string, mode: number): Promise<boolean> => {
		const dirName = stripTrailingSlashes(name);
		const target = resolve(dirName);

		if (await tryMkdir(target, mode)) return true;

		const parent = parentName(dirName);
		if (parent !== null) {
			await makeDirectory(parent, parentMode);
			if (await tryMkdir(target, mode)) return true;
		}

		report(
			new UntarError(
				`Could not create directory ${dirName}`,
				UntarErrorCode.MKDIR_FAILED,
				{ path: dirName },
			),
		);
		return false;
	};

	return {
		async createDirectory(name, mode) {
			const dirName = stripTrailingSlashes(name);
			if (!checkBounds(dirName, resolve(dirName))) return false;

			return makeDirectory(dirName, mode);
		},

		async createFile(name) {
			const target = resolve(name);
			if (!checkBounds(name, target)) return null;

			let opened = await tryOpen(target);

			if (opened instanceof Error) {
				const parent = parentName(name);
				if (parent !== null) {
					await makeDirectory(parent, parentMode);
					opened = await tryOpen(target);
				}
			}

			if (opened instanceof Error) {
				report(
					new UntarError(
						`Could not create file ${name}`,
						UntarErrorCode.CREATE_FAILED,
						{ path: name, cause: opened },
					),
				);
				return null;
			}

			return toOutputFile(opened);
		},
	};
}
