import pRetry, { AbortError as PRetryAbortError } from "p-retry";
import { createExclusionLock } from "../async/exclusion-lock";
import {
	ConfigurationFailedError,
	ConnectionFailedError,
	DiscoveryFailedError,
	DisposedError,
	type HeartRateServiceError,
} from "../errors/errors";
import {
	createConsoleLogger,
	describeError,
	type Logger,
} from "../logging/logger";
import { createEventEmitter, type TypedEventEmitter } from "../state/event-emitter";
import {
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
	type HeartRateReading,
} from "../types";
import { formatBluetoothAddress } from "../utils/address";
import {
	type ConnectionHandle,
	createConnectionHandle,
} from "./connection-handle";
import { createHandleHolder } from "./handle-holder";
import { createNotificationBridge } from "./notification-bridge";

/** Delay between connection attempts in `initiateDefault()` */
export const DEFAULT_RETRY_DELAY_MS = 2500;

export type ConnectResult =
	| { readonly ok: true; readonly device: HeartRateDeviceInfo }
	| { readonly ok: false; readonly error: HeartRateServiceError };

interface HeartRateServiceEvents extends Record<string, unknown> {
	reading: HeartRateReading;
}

export interface HeartRateServiceOptions {
	/** Bluetooth stack to discover and connect through */
	backend: HeartRateBackend;
	logger?: Logger;
	/**
	 * Delay between failed attempts in `initiateDefault()`.
	 * @default 2500
	 */
	retryDelayMs?: number;
}

/**
 * Connection manager for one heart-rate sensor.
 */
export interface HeartRateService {
	readonly isDisposed: boolean;

	/**
	 * Subscribes to the reading stream. Error readings describing
	 * connection failures arrive on the same stream.
	 * @returns Unsubscribe function
	 */
	onReading(listener: (reading: HeartRateReading) => void): () => void;

	/**
	 * Makes one attempt to find, connect to and subscribe to a device.
	 * Any previous connection is fully released first.
	 */
	connect(target?: DeviceTarget): Promise<ConnectResult>;

	/**
	 * Retries `connect()` until it succeeds or the service is disposed,
	 * publishing an error reading for every failed attempt.
	 */
	initiateDefault(target?: DeviceTarget): Promise<ConnectResult>;

	/** Releases the current connection, if any. Idempotent. */
	cleanup(): Promise<void>;

	/**
	 * Releases the current connection and makes every later `connect()`
	 * fail with `DisposedError`. Idempotent.
	 */
	dispose(): Promise<void>;

	/** The device of the installed connection, or null. */
	currentDevice(): HeartRateDeviceInfo | null;
}

function describeDevice(device: HeartRateDeviceInfo): string {
	const address =
		device.address === undefined
			? "unknown"
			: formatBluetoothAddress(device.address);
	return `[Name: ${device.name ?? "unknown"}, Address: ${address}, Id: ${device.id}, RSSI: ${device.rssi ?? "unknown"}]`;
}

/**
 * Picks one candidate regardless of the order the backend found them in.
 */
function selectCandidate(
	candidates: readonly HeartRateDeviceCandidate[],
): HeartRateDeviceCandidate | undefined {
	return [...candidates].sort((a, b) =>
		a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
	)[0];
}

function failure(error: HeartRateServiceError): ConnectResult {
	return { ok: false, error };
}

/**
 * Creates the connection manager.
 *
 * @example
 * ```typescript
 * const service = createHeartRateService({ backend: createNobleBackend() });
 *
 * service.onReading((reading) => {
 *   if (reading.isError) console.warn(reading.error);
 *   else console.log(`${reading.beatsPerMinute} bpm`);
 * });
 *
 * // Resolves once connected; keeps retrying until then
 * await service.initiateDefault();
 * ```
 */
export function createHeartRateService(
	options: HeartRateServiceOptions,
): HeartRateService {
	const {
		backend,
		logger = createConsoleLogger("[hr-ble-client:service]"),
		retryDelayMs = DEFAULT_RETRY_DELAY_MS,
	} = options;

	if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
		throw new RangeError(`retryDelayMs must be >= 0, got ${retryDelayMs}`);
	}

	const emitter: TypedEventEmitter<HeartRateServiceEvents> =
		createEventEmitter({ logger });
	const lock = createExclusionLock();
	const holder = createHandleHolder<ConnectionHandle>();
	const bridge = createNotificationBridge({
		publish: (reading) => emitter.emit("reading", reading),
		logger,
	});
	let disposed = false;

	async function configure(
		handle: ConnectionHandle,
		device: HeartRateDeviceInfo,
	): Promise<HeartRateServiceError | null> {
		const label = `${device.name ?? "unknown"} (${device.id})`;

		let service: GattService | null;
		try {
			service = await handle.session.getService(HEART_RATE_SERVICE_UUID);
		} catch (e) {
			logger.warn(`Service discovery failed on ${device.id}:`, describeError(e));
			service = null;
		}
		if (!service) {
			logger.warn(`Heart rate service not found on ${device.id}`);
			return new ConnectionFailedError(
				"service",
				`Unable to get service to ${label}. Is the device in use by another program? The Bluetooth adaptor may need to be turned off and on again.`,
			);
		}

		let characteristic: GattCharacteristic | null;
		try {
			characteristic = await service.getCharacteristic(
				HEART_RATE_MEASUREMENT_UUID,
			);
		} catch (e) {
			logger.warn(
				`Characteristic discovery failed on ${device.id}:`,
				describeError(e),
			);
			characteristic = null;
		}
		if (!characteristic) {
			return new ConnectionFailedError(
				"characteristic",
				`Unable to locate heart rate measurement on device ${label}.`,
			);
		}

		logger.info(
			`Service [CharacteristicProperties: ${characteristic.properties.join(", ")}]`,
		);

		let status: GattCommunicationStatus;
		try {
			status = await handle.subscribe(characteristic);
		} catch (e) {
			logger.warn(`Enabling notifications failed on ${device.id}:`, describeError(e));
			status = "protocolError";
		}
		logger.info(`Started ${status}`);

		if (status !== "success") {
			return new ConfigurationFailedError(status);
		}
		return null;
	}

	async function establish(
		candidate: HeartRateDeviceCandidate,
	): Promise<ConnectResult> {
		if (disposed) {
			return failure(new DisposedError());
		}

		await holder.release();

		const label = `${candidate.name ?? "unknown"} (${candidate.id})`;
		const unreachable = `Unable to connect to device ${label}. Is the device in use by another program? The Bluetooth adaptor may need to be turned off and on again.`;

		let session: GattSession | null;
		try {
			session = await candidate.openSession();
		} catch (e) {
			logger.warn(`Opening session to ${candidate.id} failed:`, describeError(e));
			return failure(
				new ConnectionFailedError("device", unreachable, { cause: e }),
			);
		}
		if (!session) {
			logger.warn(`Device ${candidate.id} unreachable`);
			return failure(new ConnectionFailedError("device", unreachable));
		}

		let handle: ConnectionHandle | null = null;
		try {
			const created = createConnectionHandle({
				session,
				logger,
				onUnexpectedDisconnect: (device) => {
					logger.warn(`Device disconnected: ${describeDevice(device)}`);
				},
			});
			handle = created;

			const configurationError = await configure(created, created.device);
			if (configurationError) {
				await created.release();
				return failure(configurationError);
			}

			// Disposed while the hardware calls were in flight
			if (disposed) {
				await created.release();
				return failure(new DisposedError());
			}

			// Attached before install so an installed handle is always listening
			created.attach((data) => {
				if (!holder.isCurrent(created)) {
					logger.debug(
						`Dropping notification from released connection to ${created.device.id}`,
					);
					return;
				}
				bridge.handleNotification(data);
			});
			await holder.replace(created);

			logger.info(`Connected to device: ${describeDevice(created.device)}`);
			return { ok: true, device: created.device };
		} catch (e) {
			logger.warn(`Setting up connection to ${candidate.id} failed:`, describeError(e));
			if (handle) {
				await handle.release();
			} else {
				await session.close().catch((err: unknown) => {
					logger.warn(
						`Error closing session to ${candidate.id}:`,
						describeError(err),
					);
				});
			}
			return failure(
				new ConnectionFailedError("device", unreachable, { cause: e }),
			);
		}
	}

	async function connect(target: DeviceTarget = {}): Promise<ConnectResult> {
		if (disposed) {
			return failure(new DisposedError());
		}

		const explicitTarget = target.address !== undefined;

		let candidates: HeartRateDeviceCandidate[];
		try {
			candidates = await backend.findDevices(target);
		} catch (e) {
			logger.warn("Device discovery failed:", describeError(e));
			return failure(new DiscoveryFailedError(explicitTarget, { cause: e }));
		}

		if (!explicitTarget) {
			// Listed so the user can pin one by address in settings
			for (const candidate of candidates) {
				logger.info(`Found suitable device: ${describeDevice(candidate)}`);
			}
		}

		const selected = selectCandidate(candidates);
		if (!selected) {
			logger.warn("Unable to locate a device.");
			if (target.address !== undefined) {
				logger.warn(
					`There's a device with address ${formatBluetoothAddress(target.address)} specified in settings, but this device can't be found.`,
				);
				logger.warn(
					"Remove it from settings to try again and try to find another device.",
				);
			}
			return failure(new DiscoveryFailedError(explicitTarget));
		}

		logger.info(`Trying to connect to device: ${describeDevice(selected)}`);

		return lock.runExclusive(() => establish(selected));
	}

	async function initiateDefault(
		target: DeviceTarget = {},
	): Promise<ConnectResult> {
		try {
			return await pRetry(
				async () => {
					const result = await connect(target);
					if (result.ok) {
						return result;
					}
					if (result.error instanceof DisposedError) {
						throw new PRetryAbortError(result.error);
					}
					throw result.error;
				},
				{
					forever: true,
					minTimeout: retryDelayMs,
					maxTimeout: retryDelayMs,
					factor: 1,
					randomize: false,
					onFailedAttempt: (error) => {
						logger.warn(
							`InitiateDefault attempt ${error.attemptNumber} failed: ${error.message}`,
						);
						emitter.emit("reading", { isError: true, error: error.message });
					},
				},
			);
		} catch (e) {
			if (e instanceof DisposedError) {
				logger.info("Reconnect abandoned: service disposed");
				return failure(e);
			}
			throw e;
		}
	}

	async function cleanup(): Promise<void> {
		// Queued behind any connect so it never lands between install and return
		await lock.runExclusive(() => holder.release());
	}

	async function dispose(): Promise<void> {
		// Set before queuing so connects already waiting on the lock bail out
		disposed = true;
		await lock.runExclusive(() => holder.release());
	}

	return {
		get isDisposed(): boolean {
			return disposed;
		},
		onReading: (listener) => emitter.on("reading", listener),
		connect,
		initiateDefault,
		cleanup,
		dispose,
		currentDevice: () => holder.current()?.device ?? null,
	};
}
