/**
 * Diagnostic Logger
 *
 * Developer-facing trace of what connections and servers do. Separate from
 * the log bus, which is the user-facing event stream.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Level named by the `RAWTAP_LOG_LEVEL` environment variable, or the fallback
 */
export function logLevelFromEnv(fallback: LogLevel = "warn", env: NodeJS.ProcessEnv = process.env): LogLevel {
	const value = env.RAWTAP_LOG_LEVEL?.trim().toLowerCase();
	return value && isLogLevel(value) ? value : fallback;
}

/**
 * Console Logger
 *
 * Writes to console, dropping messages below the configured level.
 */
export class ConsoleLogger implements Logger {
	readonly level: LogLevel;
	private prefix: string;

	constructor(options?: { level?: LogLevel; prefix?: string }) {
		this.level = options?.level ?? "info";
		this.prefix = options?.prefix ?? "[rawtap]";
	}

	enabled(level: Exclude<LogLevel, "silent">): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.enabled("debug")) console.debug(`${this.prefix} ${message}`, ...args);
	}

	info(message: string, ...args: unknown[]): void {
		if (this.enabled("info")) console.info(`${this.prefix} ${message}`, ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		if (this.enabled("warn")) console.warn(`${this.prefix} ${message}`, ...args);
	}

	error(message: string, ...args: unknown[]): void {
		if (this.enabled("error")) console.error(`${this.prefix} ${message}`, ...args);
	}
}

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

let defaultLogger: Logger | undefined;

/**
 * Shared console logger at the environment-configured level
 */
export function getDefaultLogger(): Logger {
	defaultLogger ??= new ConsoleLogger({ level: logLevelFromEnv() });
	return defaultLogger;
}
