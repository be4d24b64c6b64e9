import assert from "node:assert/strict";
import { homedir } from "node:os";
import path from "node:path";
import { test } from "node:test";
import {
	expandPath,
	isDirectChild,
	normalizePath,
	resolveUserPath,
} from "../paths.js";

test("paths utilities", () => {
	assert.equal(expandPath("~"), homedir());
	assert.equal(expandPath("~/shared"), path.join(homedir(), "shared"));
	assert.equal(expandPath("my file.txt"), "my file.txt");

	const cwd = path.join(homedir(), "work");
	assert.equal(resolveUserPath("file.txt", cwd), path.join(cwd, "file.txt"));
	assert.equal(
		resolveUserPath("~/notes/../a.txt", cwd),
		path.join(homedir(), "a.txt"),
	);

	const root = path.join(homedir(), "share");
	const child = path.join(root, "a.txt");
	const nested = path.join(root, "sub", "b.txt");
	assert.equal(isDirectChild(child, root), true);
	assert.equal(isDirectChild(nested, root), false);
	assert.equal(normalizePath(`${root}${path.sep}.`), root);
});
