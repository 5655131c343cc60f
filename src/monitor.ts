import { createNobleBackend } from "./adapter/noble";
import type { MonitorConfig } from "./config/config";
import {
	createConsoleLogger,
	describeError,
	type Logger,
} from "./logging/logger";
import {
	createHeartRateService,
	type HeartRateService,
} from "./service/heart-rate-service";
import type { DeviceTarget, HeartRateBackend, HeartRateReading } from "./types";
import {
	createHeartRateWatchdog,
	type HeartRateWatchdog,
} from "./watchdog/watchdog";

export interface HeartRateMonitorOptions {
	/** Bluetooth stack to use (default: noble) */
	backend?: HeartRateBackend;
	logger?: Logger;
}

/**
 * A connection manager and its watchdog, wired to one config.
 */
export interface HeartRateMonitor {
	readonly service: HeartRateService;
	readonly watchdog: HeartRateWatchdog;

	/**
	 * Begins connecting in the background and starts the watchdog.
	 * Returns immediately; connection failures arrive as error readings.
	 */
	start(): void;

	onReading(listener: (reading: HeartRateReading) => void): () => void;

	/** Stops the watchdog, then disposes the service. */
	dispose(): Promise<void>;
}

/**
 * @example
 * ```typescript
 * const monitor = createHeartRateMonitor(loadMonitorConfigFromEnv());
 * monitor.onReading((reading) => {
 *   if (!reading.isError) console.log(`${reading.beatsPerMinute} bpm`);
 * });
 * monitor.start();
 *
 * process.on("SIGINT", () => {
 *   void monitor.dispose();
 * });
 * ```
 */
export function createHeartRateMonitor(
	config: MonitorConfig,
	options: HeartRateMonitorOptions = {},
): HeartRateMonitor {
	const logger = options.logger ?? createConsoleLogger();
	const backend =
		options.backend ??
		createNobleBackend({
			scanTimeoutMs: config.scanTimeoutMs,
			connectionTimeoutMs: config.connectionTimeoutMs,
			logger,
		});

	const target: DeviceTarget =
		config.address === undefined ? {} : { address: config.address };

	const service = createHeartRateService({
		backend,
		logger,
		retryDelayMs: config.retryDelayMs,
	});
	const watchdog = createHeartRateWatchdog(service, {
		target,
		timeoutMs: config.timeoutMs,
		pollIntervalMs: config.pollIntervalMs,
		logger,
	});

	let started = false;

	function start(): void {
		if (started) return;
		started = true;

		service.initiateDefault(target).catch((e: unknown) => {
			logger.error("Initial connection failed:", describeError(e));
		});
		watchdog.start();
	}

	async function dispose(): Promise<void> {
		watchdog.dispose();
		await service.dispose();
	}

	return {
		service,
		watchdog,
		start,
		onReading: (listener) => service.onReading(listener),
		dispose,
	};
}
