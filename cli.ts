#!/usr/bin/env node
import { randomUUID } from "node:crypto";
import { Command, InvalidArgumentError, Option } from "commander";
import { getLocalAddress } from "./address.js";
import { downloadFile } from "./client.js";
import {
	DEFAULT_CONFIG_FILE,
	loadConfigFile,
	type PeerConfig,
} from "./config.js";
import { ShareEngine } from "./engine.js";
import { errorMessage } from "./errors.js";
import {
	ConsoleLogger,
	LOG_LEVELS,
	type Logger,
	parseLogLevel,
} from "./logger.js";
import { resolveUserPath } from "./paths.js";
import { MemoryRegistry } from "./registry.js";
import { TransferServer } from "./server.js";

function parsePort(value: string): number {
	const port = Number(value);
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		throw new InvalidArgumentError("Not a valid TCP port.");
	}
	return port;
}

function parsePositive(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

interface ServeOptions {
	config: string;
	dir?: string;
	port?: number;
	workers?: number;
	peerId: string;
	address?: string;
	logLevel?: string;
}

interface FetchOptions {
	dest?: string;
	config: string;
	logLevel?: string;
}

function createLogger(
	config: PeerConfig,
	override: string | undefined,
): Logger {
	const level = parseLogLevel(override, config.logLevel);
	return new ConsoleLogger(level, "peershare");
}

async function serve(options: ServeOptions): Promise<void> {
	const config = await loadConfigFile(options.config);
	const logger = createLogger(config, options.logLevel);
	const port = options.port ?? config.sharePort;
	const shareDir = options.dir
		? resolveUserPath(options.dir, process.cwd())
		: config.shareDir;
	const address = options.address ?? getLocalAddress();

	// Standalone mode: this peer is its own registry.
	const registry = new MemoryRegistry();
	const engine = new ShareEngine({
		registry,
		ownerId: options.peerId,
		ownerAddress: address,
		ownerPort: port,
		watchedDir: shareDir ?? null,
		ignorePatterns: config.ignore,
		logger,
	});
	const server = new TransferServer({
		port,
		workers: options.workers ?? config.maxConnections,
		files: engine,
		shutdownGraceMs: config.shutdownGraceMs,
		logger,
	});

	engine.addListener((files) => {
		logger.info("Shared files changed", { count: files.length });
	});

	try {
		await server.start();
	} catch (error) {
		logger.error(errorMessage(error));
		process.exitCode = 1;
		return;
	}
	await engine.startMonitoring(config.heartbeatSeconds);

	let stopping = false;
	const shutdown = async (): Promise<void> => {
		if (stopping) return;
		stopping = true;
		logger.info("Shutting down");
		await engine.disconnect();
		await server.stop();
	};
	const onSignal = (): void => {
		shutdown().catch((error: unknown) => {
			logger.error("Shutdown failed", { error: errorMessage(error) });
			process.exitCode = 1;
		});
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
}

async function fetchFile(
	host: string,
	port: number,
	fileName: string,
	options: FetchOptions,
): Promise<void> {
	const config = await loadConfigFile(options.config);
	const logger = createLogger(config, options.logLevel);
	const destinationDir = options.dest
		? resolveUserPath(options.dest, process.cwd())
		: config.downloadDir;
	const result = await downloadFile({
		host,
		port,
		fileName,
		destinationDir,
		logger,
	});
	if (!result.complete) process.exitCode = 2;
}

export function buildProgram(): Command {
	const program = new Command();
	program
		.name("peershare")
		.description("Share local files with peers and fetch files from them");

	const logLevelOption = new Option(
		"--log-level <level>",
		"log verbosity",
	).choices([...LOG_LEVELS]);

	program
		.command("serve")
		.description("Share a directory and serve registered files to peers")
		.option("-c, --config <file>", "configuration file", DEFAULT_CONFIG_FILE)
		.option("-d, --dir <dir>", "directory to share")
		.option("-p, --port <port>", "port to serve transfers on", parsePort)
		.option("-w, --workers <count>", "transfers served at once", parsePositive)
		.option("--peer-id <id>", "identity used with the registry", randomUUID())
		.option("--address <address>", "address announced to peers")
		.addOption(logLevelOption)
		.action(async (options: ServeOptions) => serve(options));

	program
		.command("fetch")
		.description("Download one file from a peer")
		.argument("<host>", "peer address")
		.argument("<port>", "peer port", parsePort)
		.argument("<file>", "file name to request")
		.option("--dest <dir>", "download directory")
		.option("-c, --config <file>", "configuration file", DEFAULT_CONFIG_FILE)
		.addOption(logLevelOption)
		.action(
			async (
				host: string,
				port: number,
				file: string,
				options: FetchOptions,
			) => fetchFile(host, port, file, options),
		);

	return program;
}

buildProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		console.error(errorMessage(error));
		process.exitCode = 1;
	});
