import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { Socket } from "node:net";
import { pipeline } from "node:stream/promises";
import { encodeSizeHeader, NOT_AVAILABLE, readFileRequest } from "./codec.js";
import { errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { isShareableFile } from "./scan.js";
import type { SharedFileLookup } from "./types.js";

function endSocket(socket: Socket, chunk: Buffer): Promise<void> {
	return new Promise((resolve) => {
		if (socket.destroyed) {
			resolve();
			return;
		}
		socket.once("close", () => resolve());
		socket.end(chunk, () => resolve());
	});
}

/**
 * Serves a single request on `socket` and closes it. Never rejects: every
 * failure stays with this connection.
 */
export async function handleTransfer(
	socket: Socket,
	files: SharedFileLookup,
	logger: Logger = silentLogger,
	signal?: AbortSignal,
): Promise<void> {
	const host = socket.remoteAddress ?? "unknown";
	const remote = `${host}:${socket.remotePort ?? 0}`;
	const onAbort = (): void => {
		socket.destroy();
	};
	signal?.addEventListener("abort", onAbort, { once: true });
	socket.on("error", (error) => {
		logger.debug("Socket error", { remote, error: error.message });
	});

	try {
		if (signal?.aborted) {
			socket.destroy();
			return;
		}
		const fileName = await readFileRequest(socket);
		const filePath = files.resolveSharedFile(fileName);
		if (!filePath || !(await isShareableFile(filePath))) {
			logger.warn("Refused request", { fileName, remote });
			await endSocket(socket, encodeSizeHeader(NOT_AVAILABLE));
			return;
		}

		const { size } = await stat(filePath);
		logger.info("Sending file", { fileName, size, remote });
		socket.write(encodeSizeHeader(size));
		await pipeline(createReadStream(filePath), socket);
		logger.debug("Transfer complete", { fileName, remote });
	} catch (error) {
		logger.error("Transfer failed", { remote, error: errorMessage(error) });
		socket.destroy();
	} finally {
		signal?.removeEventListener("abort", onAbort);
	}
}
