import {
	createConsoleLogger,
	describeError,
	type Logger,
} from "../logging/logger";
import type { HeartRateService } from "../service/heart-rate-service";
import type { DeviceTarget } from "../types";

/** Default staleness timeout, matching the desktop app's disconnect timeout */
export const DEFAULT_WATCHDOG_TIMEOUT_MS = 10000;

/** Default interval between staleness checks */
export const DEFAULT_WATCHDOG_POLL_INTERVAL_MS = 10000;

/**
 * - 'idle': created, not started
 * - 'running': polling
 * - 'disposed': terminal; every later tick is a no-op
 */
export type WatchdogState = "idle" | "running" | "disposed";

/** The parts of the service the watchdog depends on. */
export type WatchedService = Pick<
	HeartRateService,
	"isDisposed" | "onReading" | "initiateDefault"
>;

export interface HeartRateWatchdogOptions {
	/** Device to reconnect to */
	target?: DeviceTarget;
	/**
	 * Time without any reading after which the connection is considered stale.
	 * @default 10000
	 */
	timeoutMs?: number;
	/**
	 * Interval between staleness checks.
	 * @default 10000
	 */
	pollIntervalMs?: number;
	logger?: Logger;
	/** Clock source (default: Date.now) */
	now?: () => number;
}

export interface HeartRateWatchdog {
	readonly state: WatchdogState;
	/** Timestamp of the last reading, or of the last restart/reconnect. */
	readonly lastUpdate: number;
	/** Whether a reconnect triggered by staleness is in flight. */
	readonly isReconnecting: boolean;
	start(): void;
	dispose(): void;
}

/**
 * Creates a watchdog that forces a reconnect when readings stop arriving.
 *
 * Any reading, error readings included, counts as a sign of life. When
 * none has arrived for longer than `timeoutMs`, the watchdog calls
 * `service.initiateDefault(target)` once and waits for it to return before
 * checking again. Reconnect failures are logged, never thrown.
 *
 * @example
 * ```typescript
 * const watchdog = createHeartRateWatchdog(service, {
 *   timeoutMs: 10000,
 *   target: { address: 0xc0ffee000001 },
 * });
 * watchdog.start();
 *
 * // On shutdown
 * watchdog.dispose();
 * await service.dispose();
 * ```
 */
export function createHeartRateWatchdog(
	service: WatchedService,
	options: HeartRateWatchdogOptions = {},
): HeartRateWatchdog {
	const {
		target = {},
		timeoutMs = DEFAULT_WATCHDOG_TIMEOUT_MS,
		pollIntervalMs = DEFAULT_WATCHDOG_POLL_INTERVAL_MS,
		logger = createConsoleLogger("[hr-ble-client:watchdog]"),
		now = Date.now,
	} = options;

	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		throw new RangeError(`timeoutMs must be > 0, got ${timeoutMs}`);
	}
	if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
		throw new RangeError(`pollIntervalMs must be > 0, got ${pollIntervalMs}`);
	}

	let state: WatchdogState = "idle";
	let lastUpdate = now();
	let reconnecting = false;
	let pollTimer: ReturnType<typeof setInterval> | null = null;

	function touch(): void {
		if (state === "disposed") return;
		lastUpdate = now();
	}

	const unsubscribe = service.onReading(() => touch());

	function stopPolling(): void {
		if (pollTimer !== null) {
			clearInterval(pollTimer);
			pollTimer = null;
		}
	}

	function restart(): void {
		reconnecting = true;
		logger.warn("Restarting services...");

		service
			.initiateDefault(target)
			.then((result) => {
				if (!result.ok) {
					logger.warn(`Restart ended without a connection: ${result.error.message}`);
				}
				touch();
			})
			.catch((e: unknown) => {
				logger.error("Failed restart:", describeError(e));
			})
			.finally(() => {
				reconnecting = false;
			});
	}

	function tick(): void {
		if (state === "disposed") return;

		if (service.isDisposed) {
			logger.info("Watchdog exiting.");
			stopPolling();
			return;
		}

		if (reconnecting) return;

		if (now() - lastUpdate > timeoutMs) {
			restart();
		}
	}

	function start(): void {
		if (state !== "idle") return;

		state = "running";
		lastUpdate = now();
		pollTimer = setInterval(tick, pollIntervalMs);
	}

	function dispose(): void {
		if (state === "disposed") return;

		state = "disposed";
		stopPolling();
		unsubscribe();
	}

	return {
		get state(): WatchdogState {
			return state;
		},
		get lastUpdate(): number {
			return lastUpdate;
		},
		get isReconnecting(): boolean {
			return reconnecting;
		},
		start,
		dispose,
	};
}
