export type PeerShareErrorCode =
	| "NAME_CONFLICT"
	| "REGISTRY_UNAVAILABLE"
	| "FILE_UNAVAILABLE"
	| "TRANSFER_FAILED"
	| "SERVER_FAILED"
	| "INVALID_CONFIG";

export class PeerShareError extends Error {
	constructor(
		readonly code: PeerShareErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The registry already holds a listing with this name for the owner. */
export class NameConflictError extends PeerShareError {
	constructor(readonly fileName: string) {
		super("NAME_CONFLICT", `A file named "${fileName}" is already shared`);
	}
}

export class RegistryUnavailableError extends PeerShareError {
	constructor(operation: string, cause?: unknown) {
		super("REGISTRY_UNAVAILABLE", `Registry unavailable during ${operation}`, {
			cause,
		});
	}
}

export class FileUnavailableError extends PeerShareError {
	constructor(readonly filePath: string) {
		super("FILE_UNAVAILABLE", `Not a readable regular file: ${filePath}`);
	}
}

export class TransferError extends PeerShareError {
	constructor(message: string, cause?: unknown) {
		super("TRANSFER_FAILED", message, { cause });
	}
}

export class TransferServerError extends PeerShareError {
	constructor(message: string, cause?: unknown) {
		super("SERVER_FAILED", message, { cause });
	}
}

export class ConfigError extends PeerShareError {
	constructor(message: string) {
		super("INVALID_CONFIG", message);
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
