export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export type LogSink = (
	level: Exclude<LogLevel, "silent">,
	line: string,
) => void;

export interface Logger {
	debug(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	error(message: string, meta?: LogMeta): void;
	child(scope: string): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = [
	"debug",
	"info",
	"warn",
	"error",
	"silent",
];

const consoleSink: LogSink = (level, line) => {
	if (level === "error" || level === "warn") {
		console.error(line);
		return;
	}
	console.log(line);
};

function formatMeta(meta: LogMeta | undefined): string {
	if (!meta) return "";
	const keys = Object.keys(meta);
	if (keys.length === 0) return "";
	return ` ${JSON.stringify(meta)}`;
}

export function parseLogLevel(
	value: string | undefined,
	fallback: LogLevel = "info",
): LogLevel {
	if (!value) return fallback;
	const normalized = value.trim().toLowerCase();
	return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export class ConsoleLogger implements Logger {
	private readonly threshold: number;

	constructor(
		private readonly level: LogLevel = "info",
		private readonly scope?: string,
		private readonly sink: LogSink = consoleSink,
	) {
		this.threshold = LOG_LEVELS.indexOf(level);
	}

	debug(message: string, meta?: LogMeta): void {
		this.write("debug", message, meta);
	}

	info(message: string, meta?: LogMeta): void {
		this.write("info", message, meta);
	}

	warn(message: string, meta?: LogMeta): void {
		this.write("warn", message, meta);
	}

	error(message: string, meta?: LogMeta): void {
		this.write("error", message, meta);
	}

	child(scope: string): Logger {
		const nested = this.scope ? `${this.scope}.${scope}` : scope;
		return new ConsoleLogger(this.level, nested, this.sink);
	}

	private write(
		level: Exclude<LogLevel, "silent">,
		message: string,
		meta: LogMeta | undefined,
	): void {
		if (LOG_LEVELS.indexOf(level) < this.threshold) return;
		const prefix = this.scope ? `[${this.scope}] ` : "";
		this.sink(level, `${prefix}${message}${formatMeta(meta)}`);
	}
}

export const silentLogger: Logger = new ConsoleLogger("silent");
