import { constants, type Dirent } from "node:fs";
import { access, readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import ignore, { type Ignore, type Options } from "ignore";

const DEFAULT_IGNORES = [".*"];
export const IGNORE_FILENAME = ".shareignore";

function createIgnore(options?: Options): Ignore {
	const factory = ignore as unknown as (opts?: Options) => Ignore;
	return factory(options);
}

export function shouldIgnore(
	ignoreMatcher: Ignore,
	entryName: string,
): boolean {
	if (!entryName) return true;
	return ignoreMatcher.ignores(entryName);
}

/**
 * Hidden entries are always ignored. A `.shareignore` file inside the
 * directory and any extra patterns add gitignore-style rules on top.
 */
export async function loadIgnoreMatcher(
	dirPath: string,
	extraPatterns: readonly string[] = [],
): Promise<Ignore> {
	const matcher = createIgnore();
	matcher.add(DEFAULT_IGNORES);
	matcher.add([...extraPatterns]);
	try {
		const contents = await readFile(path.join(dirPath, IGNORE_FILENAME), "utf-8");
		matcher.add(contents);
	} catch (error) {
		const err = error as NodeJS.ErrnoException;
		if (err.code !== "ENOENT" && err.code !== "ENOTDIR") {
			throw error;
		}
	}
	return matcher;
}

export async function directoryExists(dirPath: string): Promise<boolean> {
	try {
		const dirStats = await stat(dirPath);
		return dirStats.isDirectory();
	} catch (error) {
		const err = error as NodeJS.ErrnoException;
		if (err.code === "ENOENT" || err.code === "ENOTDIR") return false;
		throw error;
	}
}

/** Regular (symlinks followed) and readable by this process. */
export async function isShareableFile(filePath: string): Promise<boolean> {
	try {
		const fileStats = await stat(filePath);
		if (!fileStats.isFile()) return false;
		await access(filePath, constants.R_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * Lists the direct children of `dirPath` that may be shared. Entries that
 * disappear while the listing is in progress are skipped.
 */
export async function listShareableFiles(
	dirPath: string,
	ignoreMatcher: Ignore,
): Promise<string[]> {
	const entries = await readdir(dirPath, { withFileTypes: true });
	const files: string[] = [];
	for (const entry of entries) {
		if (shouldIgnore(ignoreMatcher, entry.name)) continue;
		if (entry.isDirectory()) continue;
		const absolutePath = path.join(dirPath, entry.name);
		try {
			const fileStats = await stat(absolutePath);
			if (!fileStats.isFile()) continue;
		} catch (error) {
			const err = error as NodeJS.ErrnoException;
			if (err.code === "ENOENT") continue;
			throw error;
		}
		files.push(absolutePath);
	}
	return files.sort();
}

/** Regular files directly inside `dirPath`, hidden ones included. */
export async function listRegularFiles(dirPath: string): Promise<string[]> {
	let entries: Dirent[];
	try {
		entries = await readdir(dirPath, { withFileTypes: true });
	} catch (error) {
		const err = error as NodeJS.ErrnoException;
		if (err.code === "ENOENT" || err.code === "ENOTDIR") return [];
		throw error;
	}
	const files: string[] = [];
	for (const entry of entries) {
		const absolutePath = path.join(dirPath, entry.name);
		if (entry.isFile()) {
			files.push(absolutePath);
			continue;
		}
		if (entry.isSymbolicLink()) {
			const target = await stat(absolutePath).catch(() => undefined);
			if (target?.isFile()) files.push(absolutePath);
		}
	}
	return files;
}
