import { readFile } from "node:fs/promises";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MAX_HEARTBEAT_SECONDS } from "./engine.js";
import { ConfigError, errorMessage } from "./errors.js";
import { resolveUserPath } from "./paths.js";

export const DEFAULT_CONFIG_FILE = "peershare.json";

const LogLevelSchema = Type.Union(
	[
		Type.Literal("debug"),
		Type.Literal("info"),
		Type.Literal("warn"),
		Type.Literal("error"),
		Type.Literal("silent"),
	],
	{ default: "info" },
);

export const PeerConfigSchema = Type.Object(
	{
		sharePort: Type.Integer({
			minimum: 0,
			maximum: 65535,
			default: 2050,
			description: "TCP port peers connect to for transfers.",
		}),
		shareDir: Type.Optional(
			Type.String({
				minLength: 1,
				description: "Directory whose files are shared automatically.",
			}),
		),
		downloadDir: Type.String({ minLength: 1, default: "download" }),
		maxConnections: Type.Integer({
			minimum: 1,
			default: 4,
			description: "Transfers served at the same time.",
		}),
		shutdownGraceMs: Type.Integer({ minimum: 0, default: 5000 }),
		heartbeatSeconds: Type.Optional(
			Type.Integer({
				minimum: 1,
				maximum: MAX_HEARTBEAT_SECONDS,
				description:
					"Reconcile period; derived from the registry lease when unset.",
			}),
		),
		logLevel: LogLevelSchema,
		ignore: Type.Array(Type.String(), {
			default: [],
			description: "Extra gitignore-style patterns for the watched directory.",
		}),
	},
	{ additionalProperties: false },
);

export type PeerConfig = Static<typeof PeerConfigSchema>;

/** Fills defaults and validates; relative directories resolve against `cwd`. */
export function resolveConfig(
	input: unknown,
	cwd: string = process.cwd(),
): PeerConfig {
	const candidate = Value.Default(PeerConfigSchema, Value.Clone(input ?? {}));
	if (!Value.Check(PeerConfigSchema, candidate)) {
		const first = Value.Errors(PeerConfigSchema, candidate).First();
		const where = first?.path || "/";
		throw new ConfigError(
			`Invalid configuration at ${where}: ${first?.message ?? "unknown error"}`,
		);
	}
	return {
		...candidate,
		shareDir:
			candidate.shareDir === undefined
				? undefined
				: resolveUserPath(candidate.shareDir, cwd),
		downloadDir: resolveUserPath(candidate.downloadDir, cwd),
	};
}

/** A missing file yields the defaults. */
export async function loadConfigFile(
	filePath: string,
	cwd: string = process.cwd(),
): Promise<PeerConfig> {
	const absolutePath = resolveUserPath(filePath, cwd);
	let raw: string;
	try {
		raw = await readFile(absolutePath, "utf-8");
	} catch (error) {
		const err = error as NodeJS.ErrnoException;
		if (err.code === "ENOENT") return resolveConfig({}, cwd);
		throw new ConfigError(`Could not read ${absolutePath}: ${err.message}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new ConfigError(
			`Invalid JSON in ${absolutePath}: ${errorMessage(error)}`,
		);
	}
	return resolveConfig(parsed, cwd);
}
