import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { test } from "node:test";
import { loadConfigFile, resolveConfig } from "../config.js";
import { ConfigError } from "../errors.js";

async function createTempDir(prefix: string): Promise<string> {
	return mkdtemp(path.join(tmpdir(), prefix));
}

test("resolveConfig fills defaults", () => {
	const cwd = path.join(tmpdir(), "peer");
	const config = resolveConfig({}, cwd);
	assert.equal(config.sharePort, 2050);
	assert.equal(config.shareDir, undefined);
	assert.equal(config.downloadDir, path.join(cwd, "download"));
	assert.equal(config.maxConnections, 4);
	assert.equal(config.shutdownGraceMs, 5000);
	assert.equal(config.heartbeatSeconds, undefined);
	assert.equal(config.logLevel, "info");
	assert.deepEqual(config.ignore, []);
});

test("resolveConfig resolves directories against cwd", () => {
	const cwd = path.join(tmpdir(), "peer");
	const config = resolveConfig(
		{
			shareDir: "files",
			downloadDir: "/srv/in",
			sharePort: 3000,
			logLevel: "debug",
		},
		cwd,
	);
	assert.equal(config.shareDir, path.join(cwd, "files"));
	assert.equal(config.downloadDir, path.normalize("/srv/in"));
	assert.equal(config.sharePort, 3000);
	assert.equal(config.logLevel, "debug");
});

test("resolveConfig reports the first invalid setting", () => {
	assert.throws(
		() => resolveConfig({ sharePort: 70000 }),
		(error: unknown) =>
			error instanceof ConfigError && error.message.includes("/sharePort"),
	);
	assert.throws(() => resolveConfig({ maxConnections: 0 }), ConfigError);
	assert.throws(() => resolveConfig({ unknownSetting: true }), ConfigError);
	assert.throws(() => resolveConfig({ logLevel: "loud" }), ConfigError);
	assert.throws(
		() => resolveConfig({ heartbeatSeconds: 3000000 }),
		(error: unknown) =>
			error instanceof ConfigError &&
			error.message.includes("/heartbeatSeconds"),
	);
	assert.equal(resolveConfig({ heartbeatSeconds: 30 }).heartbeatSeconds, 30);
});

test("loadConfigFile reads JSON and tolerates a missing file", async () => {
	const root = await createTempDir("peershare-config-");
	try {
		const missing = await loadConfigFile("absent.json", root);
		assert.equal(missing.sharePort, 2050);

		await writeFile(
			path.join(root, "peershare.json"),
			JSON.stringify({ shareDir: "shared", ignore: ["*.tmp"] }),
			"utf-8",
		);
		const loaded = await loadConfigFile("peershare.json", root);
		assert.equal(loaded.shareDir, path.join(root, "shared"));
		assert.deepEqual(loaded.ignore, ["*.tmp"]);

		await writeFile(path.join(root, "broken.json"), "{ not json", "utf-8");
		await assert.rejects(loadConfigFile("broken.json", root), /Invalid JSON/);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});
