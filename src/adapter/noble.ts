import noble from "@abandonware/noble";
import {
	DEFAULT_CONNECTION_TIMEOUT_MS,
	DEFAULT_SCAN_TIMEOUT_MS,
} from "../config/config";
import { TimeoutError, withTimeout } from "../errors/errors";
import {
	createConsoleLogger,
	describeError,
	type Logger,
} from "../logging/logger";
import {
	type DeviceTarget,
	type GattCharacteristic,
	type GattCommunicationStatus,
	type GattService,
	type GattSession,
	HEART_RATE_SERVICE_UUID,
	type HeartRateBackend,
	type HeartRateDeviceCandidate,
	type HeartRateDeviceInfo,
} from "../types";
import { formatBluetoothAddress, parseBluetoothAddress } from "../utils/address";
import { uuidMatches } from "../utils/uuid";

/** How long to wait for the adapter to report `poweredOn` */
export const DEFAULT_POWER_ON_TIMEOUT_MS = 15000;

// noble has one scanner per process; it stops when the last scan using it ends
let activeScans = 0;

export interface NobleBackendOptions {
	/**
	 * How long one discovery scan runs.
	 * A scan for an explicit address ends as soon as it is seen.
	 * @default 5000
	 */
	scanTimeoutMs?: number;

	/**
	 * Timeout for GATT connection in milliseconds.
	 * @default 20000
	 */
	connectionTimeoutMs?: number;

	/**
	 * How long to wait for the Bluetooth adapter to power on.
	 * @default 15000
	 */
	powerOnTimeoutMs?: number;

	logger?: Logger;
}

function waitForPoweredOn(timeoutMs: number): Promise<void> {
	return new Promise((resolve, reject) => {
		if (noble._state === "poweredOn") {
			resolve();
			return;
		}

		const onStateChange = (state: string): void => {
			if (state === "poweredOn") {
				clearTimeout(timeout);
				noble.removeListener("stateChange", onStateChange);
				resolve();
			}
		};

		const timeout = setTimeout(() => {
			noble.removeListener("stateChange", onStateChange);
			reject(new TimeoutError("Bluetooth adapter power on", timeoutMs));
		}, timeoutMs);

		noble.on("stateChange", onStateChange);
	});
}

function toDeviceInfo(peripheral: noble.Peripheral): HeartRateDeviceInfo {
	return {
		id: peripheral.id,
		name: peripheral.advertisement.localName || undefined,
		address: parseBluetoothAddress(peripheral.address) ?? undefined,
		rssi: peripheral.rssi,
	};
}

function adaptCharacteristic(
	characteristic: noble.Characteristic,
	logger: Logger,
): GattCharacteristic {
	return {
		uuid: characteristic.uuid,
		properties: characteristic.properties,
		async enableNotifications(): Promise<GattCommunicationStatus> {
			try {
				await characteristic.subscribeAsync();
				return "success";
			} catch (e) {
				logger.warn("Subscribe failed:", describeError(e));
				return "protocolError";
			}
		},
		disableNotifications: () => characteristic.unsubscribeAsync(),
		onValueChanged(callback: (data: Uint8Array) => void): () => void {
			const handler = (data: Buffer, isNotification: boolean): void => {
				// Read responses arrive on the same event
				if (isNotification) {
					callback(data);
				}
			};
			characteristic.on("data", handler);
			return () => {
				characteristic.removeListener("data", handler);
			};
		},
	};
}

function adaptService(service: noble.Service, logger: Logger): GattService {
	return {
		uuid: service.uuid,
		async getCharacteristic(uuid: string): Promise<GattCharacteristic | null> {
			const characteristics = await service.discoverCharacteristicsAsync([
				uuid,
			]);
			const match = characteristics.find((c) => uuidMatches(c.uuid, uuid));
			return match ? adaptCharacteristic(match, logger) : null;
		},
	};
}

function createSession(peripheral: noble.Peripheral, logger: Logger): GattSession {
	return {
		device: toDeviceInfo(peripheral),
		async getService(uuid: string): Promise<GattService | null> {
			const services = await peripheral.discoverServicesAsync([uuid]);
			const match = services.find((s) => uuidMatches(s.uuid, uuid));
			return match ? adaptService(match, logger) : null;
		},
		async close(): Promise<void> {
			if (peripheral.state === "disconnected") return;
			await peripheral.disconnectAsync();
		},
		onDisconnect(callback: () => void): () => void {
			const handler = (): void => {
				callback();
			};
			peripheral.on("disconnect", handler);
			return () => {
				peripheral.removeListener("disconnect", handler);
			};
		},
	};
}

/**
 * Creates a backend on top of noble, the Node.js BLE central library.
 *
 * @example
 * ```typescript
 * const service = createHeartRateService({
 *   backend: createNobleBackend({ scanTimeoutMs: 8000 }),
 * });
 * ```
 */
export function createNobleBackend(
	options: NobleBackendOptions = {},
): HeartRateBackend {
	const scanTimeoutMs = options.scanTimeoutMs ?? DEFAULT_SCAN_TIMEOUT_MS;
	const connectionTimeoutMs =
		options.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
	const powerOnTimeoutMs =
		options.powerOnTimeoutMs ?? DEFAULT_POWER_ON_TIMEOUT_MS;
	const logger = options.logger ?? createConsoleLogger("[hr-ble-client:noble]");

	function scan(target: DeviceTarget): Promise<noble.Peripheral[]> {
		const wanted =
			target.address === undefined
				? undefined
				: formatBluetoothAddress(target.address);

		return new Promise((resolve, reject) => {
			const found = new Map<string, noble.Peripheral>();
			let settled = false;

			const stop = (): void => {
				clearTimeout(timeout);
				noble.removeListener("discover", onDiscover);
				activeScans--;
				if (activeScans > 0) {
					logger.debug(`Leaving scanner running for ${activeScans} other scan(s)`);
					return;
				}
				noble.stopScanningAsync().catch((e: unknown) => {
					logger.warn("Error stopping scan:", describeError(e));
				});
			};

			const finish = (): void => {
				if (settled) return;
				settled = true;
				stop();
				resolve([...found.values()]);
			};

			const onDiscover = (peripheral: noble.Peripheral): void => {
				if (wanted !== undefined) {
					if (peripheral.address.toLowerCase() === wanted) {
						found.set(peripheral.id, peripheral);
						finish();
					}
					return;
				}

				const advertised = peripheral.advertisement.serviceUuids || [];
				if (advertised.some((u) => uuidMatches(u, HEART_RATE_SERVICE_UUID))) {
					found.set(peripheral.id, peripheral);
				}
			};

			const timeout = setTimeout(finish, scanTimeoutMs);

			activeScans++;
			noble.on("discover", onDiscover);
			// An explicit address may not advertise the service, so scan everything
			noble
				.startScanningAsync(wanted ? [] : [HEART_RATE_SERVICE_UUID], false)
				.catch((e: unknown) => {
					if (settled) return;
					settled = true;
					stop();
					reject(e);
				});
		});
	}

	function toCandidate(peripheral: noble.Peripheral): HeartRateDeviceCandidate {
		return {
			...toDeviceInfo(peripheral),
			async openSession(): Promise<GattSession | null> {
				try {
					await withTimeout(
						peripheral.connectAsync(),
						connectionTimeoutMs,
						"GATT connection",
					);
				} catch (e) {
					if (e instanceof TimeoutError) {
						peripheral.disconnectAsync().catch((err: unknown) => {
							logger.warn(
								"Error abandoning timed out connection:",
								describeError(err),
							);
						});
					}
					throw e;
				}

				if (peripheral.state !== "connected") {
					return null;
				}
				return createSession(peripheral, logger);
			},
		};
	}

	const scansInFlight = new Map<string, Promise<noble.Peripheral[]>>();

	function sharedScan(target: DeviceTarget): Promise<noble.Peripheral[]> {
		const key = target.address === undefined ? "any" : String(target.address);
		const inFlight = scansInFlight.get(key);
		if (inFlight) {
			return inFlight;
		}

		const scanning = scan(target).finally(() => {
			scansInFlight.delete(key);
		});
		scansInFlight.set(key, scanning);
		return scanning;
	}

	return {
		async findDevices(target: DeviceTarget): Promise<HeartRateDeviceCandidate[]> {
			await waitForPoweredOn(powerOnTimeoutMs);
			const peripherals = await sharedScan(target);
			return peripherals.map(toCandidate);
		},
	};
}
