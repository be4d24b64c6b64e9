import { homedir } from "node:os";
import path from "node:path";

const UNICODE_SPACES = /[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g;

function normalizeUnicodeSpaces(value: string): string {
	return value.replace(UNICODE_SPACES, " ");
}

export function expandPath(filePath: string): string {
	const normalized = normalizeUnicodeSpaces(filePath);
	if (normalized === "~") {
		return homedir();
	}
	if (normalized.startsWith("~/")) {
		return homedir() + normalized.slice(1);
	}
	return normalized;
}

export function resolveUserPath(filePath: string, cwd: string): string {
	const expanded = expandPath(filePath);
	if (path.isAbsolute(expanded)) {
		return path.normalize(expanded);
	}
	return path.resolve(cwd, expanded);
}

export function normalizePath(value: string): string {
	return path.resolve(value);
}

export function isDirectChild(targetPath: string, dirPath: string): boolean {
	return path.dirname(normalizePath(targetPath)) === normalizePath(dirPath);
}
