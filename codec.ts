import type { Readable } from "node:stream";
import { TransferError } from "./errors.js";

/** Length sent in place of a file size when the file cannot be served. */
export const NOT_AVAILABLE = -1;
export const NAME_LENGTH_BYTES = 2;
export const SIZE_HEADER_BYTES = 8;
export const MAX_NAME_BYTES = 0xffff;

export function encodeFileRequest(fileName: string): Buffer {
	const name = Buffer.from(fileName, "utf-8");
	if (name.length === 0) {
		throw new RangeError("File name must not be empty");
	}
	if (name.length > MAX_NAME_BYTES) {
		throw new RangeError(
			`File name is ${name.length} bytes; at most ${MAX_NAME_BYTES} are allowed`,
		);
	}
	const frame = Buffer.alloc(NAME_LENGTH_BYTES + name.length);
	frame.writeUInt16BE(name.length, 0);
	name.copy(frame, NAME_LENGTH_BYTES);
	return frame;
}

export function encodeSizeHeader(size: number): Buffer {
	if (!Number.isSafeInteger(size) || size < NOT_AVAILABLE) {
		throw new RangeError(`Invalid size header value: ${size}`);
	}
	const header = Buffer.alloc(SIZE_HEADER_BYTES);
	header.writeBigInt64BE(BigInt(size), 0);
	return header;
}

export function decodeSizeHeader(header: Buffer): number {
	if (header.length !== SIZE_HEADER_BYTES) {
		throw new TransferError(
			`Size header must be ${SIZE_HEADER_BYTES} bytes, got ${header.length}`,
		);
	}
	const value = header.readBigInt64BE(0);
	if (
		value > BigInt(Number.MAX_SAFE_INTEGER) ||
		value < BigInt(Number.MIN_SAFE_INTEGER)
	) {
		throw new TransferError(`Size header out of range: ${value}`);
	}
	return Number(value);
}

/**
 * Resolves with exactly `size` bytes from a paused stream. Rejects when the
 * stream ends or fails first. Bytes beyond `size` stay buffered in the stream.
 */
export function readExact(stream: Readable, size: number): Promise<Buffer> {
	if (size === 0) return Promise.resolve(Buffer.alloc(0));
	return new Promise<Buffer>((resolve, reject) => {
		let settled = false;
		const cleanup = (): void => {
			settled = true;
			stream.off("readable", onReadable);
			stream.off("end", onEnd);
			stream.off("close", onEnd);
			stream.off("error", onError);
		};
		const onReadable = (): void => {
			const chunk: Buffer | null = stream.read(size);
			if (chunk === null) return;
			cleanup();
			if (chunk.length < size) {
				reject(
					new TransferError(
						`Connection closed after ${chunk.length} of ${size} bytes`,
					),
				);
				return;
			}
			resolve(chunk);
		};
		const onEnd = (): void => {
			cleanup();
			reject(new TransferError(`Connection closed before ${size} bytes arrived`));
		};
		const onError = (error: Error): void => {
			cleanup();
			reject(new TransferError(`Read failed: ${error.message}`, error));
		};
		stream.on("readable", onReadable);
		stream.on("end", onEnd);
		stream.on("close", onEnd);
		stream.on("error", onError);
		onReadable();
		if (!settled && (stream.readableEnded || stream.destroyed)) onEnd();
	});
}

export async function readFileRequest(stream: Readable): Promise<string> {
	const lengthField = await readExact(stream, NAME_LENGTH_BYTES);
	const length = lengthField.readUInt16BE(0);
	if (length === 0) {
		throw new TransferError("Empty file name requested");
	}
	const name = await readExact(stream, length);
	return name.toString("utf-8");
}

export async function readSizeHeader(stream: Readable): Promise<number> {
	return decodeSizeHeader(await readExact(stream, SIZE_HEADER_BYTES));
}
