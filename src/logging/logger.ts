import { normalizeError } from "../errors/errors";

/**
 * Diagnostic sink. The console-backed default writes
 * `[prefix] message` lines; hosts can supply their own to route
 * lines into a file or UI.
 */
export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

export const DEFAULT_LOG_PREFIX = "[hr-ble-client]";

/**
 * Creates a logger that writes through `console`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("[hr-ble-client:watchdog]");
 * logger.warn("Restarting services...");
 * // [hr-ble-client:watchdog] Restarting services...
 * ```
 */
export function createConsoleLogger(prefix = DEFAULT_LOG_PREFIX): Logger {
	return {
		debug: (message, ...details) =>
			console.debug(`${prefix} ${message}`, ...details),
		info: (message, ...details) =>
			console.info(`${prefix} ${message}`, ...details),
		warn: (message, ...details) =>
			console.warn(`${prefix} ${message}`, ...details),
		error: (message, ...details) =>
			console.error(`${prefix} ${message}`, ...details),
	};
}

export function createNoOpLogger(): Logger {
	return {
		debug(): void {},
		info(): void {},
		warn(): void {},
		error(): void {},
	};
}

/**
 * Formats a thrown value for a single log line.
 */
export function describeError(e: unknown): string {
	return normalizeError(e).message;
}
