export { getLocalAddress, LOOPBACK_ADDRESS } from "./address.js";
export { type DownloadOptions, downloadFile, fetchListing } from "./client.js";
export {
	decodeSizeHeader,
	encodeFileRequest,
	encodeSizeHeader,
	MAX_NAME_BYTES,
	NAME_LENGTH_BYTES,
	NOT_AVAILABLE,
	readExact,
	readFileRequest,
	readSizeHeader,
	SIZE_HEADER_BYTES,
} from "./codec.js";
export {
	DEFAULT_CONFIG_FILE,
	loadConfigFile,
	type PeerConfig,
	PeerConfigSchema,
	resolveConfig,
} from "./config.js";
export {
	heartbeatPeriodSeconds,
	MAX_HEARTBEAT_SECONDS,
	MAX_RESYNC_RETRIES,
	MIN_HEARTBEAT_SECONDS,
	ShareEngine,
	type ShareEngineOptions,
} from "./engine.js";
export {
	ConfigError,
	errorMessage,
	FileUnavailableError,
	NameConflictError,
	PeerShareError,
	type PeerShareErrorCode,
	RegistryUnavailableError,
	TransferError,
	TransferServerError,
} from "./errors.js";
export { handleTransfer } from "./handler.js";
export {
	ConsoleLogger,
	LOG_LEVELS,
	type Logger,
	type LogLevel,
	type LogMeta,
	type LogSink,
	parseLogLevel,
	silentLogger,
} from "./logger.js";
export { type PoolTask, WorkerPool } from "./pool.js";
export {
	DEFAULT_LEASE_SECONDS,
	MemoryRegistry,
	type MemoryRegistryOptions,
	type Registry,
} from "./registry.js";
export {
	IGNORE_FILENAME,
	listShareableFiles,
	loadIgnoreMatcher,
} from "./scan.js";
export {
	DEFAULT_SHUTDOWN_GRACE_MS,
	TransferServer,
	type TransferServerOptions,
} from "./server.js";
export type {
	Listing,
	ListingId,
	OwnerInfo,
	RegistrationTable,
	ShareChangeListener,
	SharedFileLookup,
	TransferResult,
} from "./types.js";
