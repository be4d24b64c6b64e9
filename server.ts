import {
	type AddressInfo,
	createServer,
	type Server,
	type Socket,
} from "node:net";
import { errorMessage, TransferServerError } from "./errors.js";
import { handleTransfer } from "./handler.js";
import { type Logger, silentLogger } from "./logger.js";
import { WorkerPool } from "./pool.js";
import type { SharedFileLookup } from "./types.js";

export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

export interface TransferServerOptions {
	port: number;
	host?: string;
	workers: number;
	files: SharedFileLookup;
	shutdownGraceMs?: number;
	logger?: Logger;
}

/**
 * Accepts peer connections and hands each one to a fixed-size worker pool.
 * Node sets SO_REUSEADDR on listening TCP sockets, so a quick restart on the
 * same port does not hit TIME_WAIT.
 */
export class TransferServer {
	private server: Server | null = null;
	private pool: WorkerPool | null = null;
	private readonly logger: Logger;

	constructor(private readonly options: TransferServerOptions) {
		this.logger = (options.logger ?? silentLogger).child("p2p");
	}

	get listening(): boolean {
		return this.server?.listening ?? false;
	}

	address(): AddressInfo | null {
		const address = this.server?.address();
		if (!address || typeof address === "string") return null;
		return address;
	}

	async start(): Promise<AddressInfo> {
		if (this.server) {
			throw new TransferServerError("Transfer server already started");
		}
		const pool = new WorkerPool(this.options.workers, this.logger);
		const server = createServer((socket) => this.dispatch(pool, socket));

		try {
			await new Promise<void>((resolve, reject) => {
				server.once("error", reject);
				server.listen(
					{ port: this.options.port, host: this.options.host },
					() => {
						server.off("error", reject);
						resolve();
					},
				);
			});
		} catch (error) {
			server.close();
			throw new TransferServerError(
				`Could not listen on port ${this.options.port}: ${errorMessage(error)}`,
				error,
			);
		}

		server.on("error", (error) => {
			this.logger.error("Connection accept error", { error: error.message });
		});
		this.server = server;
		this.pool = pool;

		const bound = this.address();
		if (!bound) {
			throw new TransferServerError("Transfer server has no TCP address");
		}
		this.logger.info("Peer server listening", {
			port: bound.port,
			workers: pool.size,
		});
		return bound;
	}

	/**
	 * Stops accepting connections, then gives in-flight transfers the grace
	 * period before destroying their sockets.
	 */
	async stop(): Promise<void> {
		const server = this.server;
		const pool = this.pool;
		if (!server || !pool) return;
		this.server = null;
		this.pool = null;

		const closed = new Promise<void>((resolve) => server.close(() => resolve()));
		const graceful = await pool.shutdown(
			this.options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS,
		);
		await closed;
		this.logger.info(
			graceful
				? "Peer server stopped"
				: "Peer server stopped after forcing transfers",
		);
	}

	private dispatch(pool: WorkerPool, socket: Socket): void {
		const accepted = pool.submit((signal) =>
			handleTransfer(socket, this.options.files, this.logger, signal),
		);
		if (!accepted) {
			socket.destroy();
		}
	}
}
