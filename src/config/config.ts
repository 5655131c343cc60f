import { DEFAULT_RETRY_DELAY_MS } from "../service/heart-rate-service";
import { parseBluetoothAddress } from "../utils/address";
import {
	DEFAULT_WATCHDOG_POLL_INTERVAL_MS,
	DEFAULT_WATCHDOG_TIMEOUT_MS,
} from "../watchdog/watchdog";

/** How long one discovery scan runs */
export const DEFAULT_SCAN_TIMEOUT_MS = 5000;

/** Default timeout for GATT connection in milliseconds */
export const DEFAULT_CONNECTION_TIMEOUT_MS = 20000;

/**
 * Settings supplied by the host application.
 */
export interface MonitorConfig {
	/** 48-bit address of the device to pin; any heart-rate device when unset */
	readonly address: number | undefined;
	/** Time without readings before the watchdog forces a reconnect */
	readonly timeoutMs: number;
	/** Interval between watchdog staleness checks */
	readonly pollIntervalMs: number;
	/** Delay between connection attempts */
	readonly retryDelayMs: number;
	/** How long one discovery scan runs */
	readonly scanTimeoutMs: number;
	/** Timeout for opening a GATT connection */
	readonly connectionTimeoutMs: number;
}

export interface MonitorConfigInput {
	/** Integer, decimal string, or colon/bare hex string */
	address?: number | string;
	timeoutMs?: number;
	pollIntervalMs?: number;
	retryDelayMs?: number;
	scanTimeoutMs?: number;
	connectionTimeoutMs?: number;
}

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
	address: undefined,
	timeoutMs: DEFAULT_WATCHDOG_TIMEOUT_MS,
	pollIntervalMs: DEFAULT_WATCHDOG_POLL_INTERVAL_MS,
	retryDelayMs: DEFAULT_RETRY_DELAY_MS,
	scanTimeoutMs: DEFAULT_SCAN_TIMEOUT_MS,
	connectionTimeoutMs: DEFAULT_CONNECTION_TIMEOUT_MS,
};

function requirePositive(name: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new RangeError(`${name} must be a positive number, got ${value}`);
	}
	return value;
}

/**
 * Merges `input` over the defaults and validates the result.
 *
 * @throws RangeError if a duration isn't a positive number or the
 *   address isn't a 48-bit address
 *
 * @example
 * ```typescript
 * const config = resolveMonitorConfig({ address: "c0:ff:ee:00:00:01" });
 * config.address;   // 0xc0ffee000001
 * config.timeoutMs; // 10000
 * ```
 */
export function resolveMonitorConfig(
	input: MonitorConfigInput = {},
): MonitorConfig {
	let address: number | undefined;
	if (input.address !== undefined) {
		const parsed = parseBluetoothAddress(input.address);
		if (parsed === null) {
			throw new RangeError(`Invalid Bluetooth address: ${input.address}`);
		}
		address = parsed;
	}

	return {
		address,
		timeoutMs: requirePositive(
			"timeoutMs",
			input.timeoutMs ?? DEFAULT_MONITOR_CONFIG.timeoutMs,
		),
		pollIntervalMs: requirePositive(
			"pollIntervalMs",
			input.pollIntervalMs ?? DEFAULT_MONITOR_CONFIG.pollIntervalMs,
		),
		retryDelayMs: requirePositive(
			"retryDelayMs",
			input.retryDelayMs ?? DEFAULT_MONITOR_CONFIG.retryDelayMs,
		),
		scanTimeoutMs: requirePositive(
			"scanTimeoutMs",
			input.scanTimeoutMs ?? DEFAULT_MONITOR_CONFIG.scanTimeoutMs,
		),
		connectionTimeoutMs: requirePositive(
			"connectionTimeoutMs",
			input.connectionTimeoutMs ?? DEFAULT_MONITOR_CONFIG.connectionTimeoutMs,
		),
	};
}

/** Environment variables read by `loadMonitorConfigFromEnv()`. */
export const MONITOR_ENV = {
	address: "HEART_RATE_ADDRESS",
	timeoutMs: "HEART_RATE_TIMEOUT_MS",
	pollIntervalMs: "HEART_RATE_POLL_INTERVAL_MS",
} as const;

function readNumber(
	env: Record<string, string | undefined>,
	name: string,
): number | undefined {
	const raw = env[name]?.trim();
	if (raw === undefined || raw === "") return undefined;
	const value = Number(raw);
	if (Number.isNaN(value)) {
		throw new RangeError(`${name} must be a number, got "${raw}"`);
	}
	return value;
}

/**
 * Builds a config from environment variables, falling back to defaults
 * for anything unset.
 */
export function loadMonitorConfigFromEnv(
	env: Record<string, string | undefined> = process.env,
): MonitorConfig {
	const input: MonitorConfigInput = {};

	const address = env[MONITOR_ENV.address]?.trim();
	if (address) input.address = address;

	const timeoutMs = readNumber(env, MONITOR_ENV.timeoutMs);
	if (timeoutMs !== undefined) input.timeoutMs = timeoutMs;

	const pollIntervalMs = readNumber(env, MONITOR_ENV.pollIntervalMs);
	if (pollIntervalMs !== undefined) input.pollIntervalMs = pollIntervalMs;

	return resolveMonitorConfig(input);
}
