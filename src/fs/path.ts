import * as path from "node:path";

// Checks that the target path is the destination directory or lies within it.
export function isWithinBounds(targetPath: string, destDir: string): boolean {
	const target = path.resolve(targetPath);
	const dest = path.resolve(destDir);
	return target === dest || target.startsWith(dest + path.sep);
}

// Strips trailing slashes from an entry name ("dir/" -> "dir"), keeping a lone "/".
export const stripTrailingSlashes = (name: string): string =>
	name.length > 1 ? name.replace(/\/+$/, "") || "/" : name;

// Returns the part of an entry name before its last "/", or null when there is none.
export function parentName(name: string): string | null {
	const index = name.lastIndexOf("/");
	return index > 0 ? name.slice(0, index) : null;
}

/**
 * Resolves an entry name against the destination directory.
 *
 * With `preservePaths` the name is resolved as-is, so absolute names stay
 * absolute. Otherwise it is joined beneath `destDir`.
 */
export function resolveEntryPath(
	destDir: string,
	name: string,
	preservePaths: boolean,
): string {
	return preservePaths
		? path.resolve(destDir, name)
		: path.join(path.resolve(destDir), name);
}
