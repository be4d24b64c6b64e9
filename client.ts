import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { connect, type Socket } from "node:net";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { encodeFileRequest, readSizeHeader } from "./codec.js";
import { errorMessage, TransferError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import type { Registry } from "./registry.js";
import type { ListingId, TransferResult } from "./types.js";

export interface DownloadOptions {
	host: string;
	port: number;
	fileName: string;
	destinationDir: string;
	logger?: Logger;
}

function openConnection(host: string, port: number): Promise<Socket> {
	return new Promise((resolve, reject) => {
		const socket = connect({ host, port });
		const onError = (error: Error): void => {
			socket.destroy();
			reject(
				new TransferError(
					`Could not connect to ${host}:${port}: ${error.message}`,
					error,
				),
			);
		};
		socket.once("error", onError);
		socket.once("connect", () => {
			socket.off("error", onError);
			resolve(socket);
		});
	});
}

/**
 * Requests `fileName` from a peer and writes it to `destinationDir`. A byte
 * count that differs from the announced size is logged and reported through
 * `complete: false`; the partial file is left on disk.
 */
export async function downloadFile(
	options: DownloadOptions,
): Promise<TransferResult> {
	const logger = (options.logger ?? silentLogger).child("p2p");
	const { host, port, fileName } = options;
	await mkdir(options.destinationDir, { recursive: true });

	logger.info("Requesting file", { fileName, host, port });
	const socket = await openConnection(host, port);
	try {
		socket.write(encodeFileRequest(fileName));
		const expectedBytes = await readSizeHeader(socket);
		if (expectedBytes < 1) {
			throw new TransferError(`Remote peer could not provide ${fileName}`);
		}
		logger.debug("Peer reported size", { fileName, expectedBytes });

		const destination = path.join(
			options.destinationDir,
			path.basename(fileName),
		);
		let receivedBytes = 0;
		await pipeline(
			socket,
			async function* (source: AsyncIterable<Buffer>) {
				for await (const chunk of source) {
					const remaining = expectedBytes - receivedBytes;
					receivedBytes += chunk.length;
					if (remaining <= 0) continue;
					yield chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
				}
			},
			createWriteStream(destination),
		);

		const complete = receivedBytes === expectedBytes;
		if (complete) {
			logger.info("Transfer complete", { fileName, destination });
		} else {
			logger.warn("Transfer size mismatch", {
				fileName,
				expectedBytes,
				receivedBytes,
			});
		}
		return { fileName, destination, expectedBytes, receivedBytes, complete };
	} catch (error) {
		logger.error("Download failed", { fileName, error: errorMessage(error) });
		throw error instanceof TransferError
			? error
			: new TransferError(
					`Download of ${fileName} failed: ${errorMessage(error)}`,
					error,
				);
	} finally {
		socket.destroy();
	}
}

/** Looks the listing's owner up right before connecting to it. */
export async function fetchListing(
	registry: Registry,
	listingId: ListingId,
	destinationDir: string,
	logger?: Logger,
): Promise<TransferResult> {
	const owner = await registry.getOwner(listingId);
	if (!owner) {
		throw new TransferError(`Listing ${listingId} is no longer available`);
	}
	return downloadFile({
		host: owner.ownerAddress,
		port: owner.ownerPort,
		fileName: owner.fileName,
		destinationDir,
		logger,
	});
}
