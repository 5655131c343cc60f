/**
 * hr-ble-client - Bluetooth LE heart-rate sensor client for Node.js.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import {
 *   createHeartRateMonitor,
 *   loadMonitorConfigFromEnv,
 * } from 'hr-ble-client';
 *
 * const monitor = createHeartRateMonitor(loadMonitorConfigFromEnv());
 *
 * monitor.onReading((reading) => {
 *   if (reading.isError) {
 *     console.warn(reading.error);
 *   } else {
 *     console.log(`${reading.beatsPerMinute} bpm`);
 *   }
 * });
 *
 * monitor.start();
 * ```
 */

// Adapter
export {
	createNobleBackend,
	DEFAULT_POWER_ON_TIMEOUT_MS,
	type NobleBackendOptions,
} from "./adapter/noble";
// Async utilities
export { createExclusionLock, type ExclusionLock } from "./async/exclusion-lock";
// Config
export {
	DEFAULT_CONNECTION_TIMEOUT_MS,
	DEFAULT_MONITOR_CONFIG,
	DEFAULT_SCAN_TIMEOUT_MS,
	loadMonitorConfigFromEnv,
	MONITOR_ENV,
	type MonitorConfig,
	type MonitorConfigInput,
	resolveMonitorConfig,
} from "./config/config";
// Decoder
export {
	decodeHeartRateMeasurement,
	RR_INTERVAL_UNITS_PER_SECOND,
	rrIntervalsToMilliseconds,
} from "./decoder/frame-decoder";
// Errors
export {
	ConfigurationFailedError,
	ConnectionFailedError,
	type ConnectionStep,
	DiscoveryFailedError,
	DisposedError,
	HeartRateServiceError,
	type HeartRateServiceErrorKind,
	normalizeError,
	TimeoutError,
	withTimeout,
} from "./errors/errors";
// Logging
export {
	createConsoleLogger,
	createNoOpLogger,
	DEFAULT_LOG_PREFIX,
	describeError,
	type Logger,
} from "./logging/logger";
// Monitor
export {
	createHeartRateMonitor,
	type HeartRateMonitor,
	type HeartRateMonitorOptions,
} from "./monitor";
// Service
export {
	type ConnectResult,
	createHeartRateService,
	DEFAULT_RETRY_DELAY_MS,
	type HeartRateService,
	type HeartRateServiceOptions,
} from "./service/heart-rate-service";
// State management
export {
	createEventEmitter,
	type EventMap,
	type TypedEventEmitter,
} from "./state";
// Types
export {
	ContactSensorStatus,
	type DeviceTarget,
	type GattCharacteristic,
	type GattCommunicationStatus,
	type GattService,
	type GattSession,
	HEART_RATE_MEASUREMENT_UUID,
	HEART_RATE_SERVICE_UUID,
	type HeartRateBackend,
	type HeartRateDeviceCandidate,
	type HeartRateDeviceInfo,
	type HeartRateErrorReading,
	HeartRateFlags,
	type HeartRateMeasurement,
	type HeartRateReading,
} from "./types";
// Utils
export {
	BLUETOOTH_UUID_BASE,
	formatBluetoothAddress,
	MAX_BLUETOOTH_ADDRESS,
	parseBluetoothAddress,
	uuidMatches,
} from "./utils";
// Watchdog
export {
	createHeartRateWatchdog,
	DEFAULT_WATCHDOG_POLL_INTERVAL_MS,
	DEFAULT_WATCHDOG_TIMEOUT_MS,
	type HeartRateWatchdog,
	type HeartRateWatchdogOptions,
	type WatchdogState,
	type WatchedService,
} from "./watchdog/watchdog";
