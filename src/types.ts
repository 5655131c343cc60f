/**
 * @fileoverview Core type definitions for hr-ble-client.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - `decodeHeartRateMeasurement()` returns `null` for undersized frames
 *   - `GattSession.getService()` returns `null` when the service is absent
 *   - `currentDevice()` returns `null` when no handle is installed
 *
 * - **`undefined`**: Not set or optional property
 *   - `DeviceTarget.address` is `undefined` when any device is eligible
 *   - `energyExpended` is `undefined` when the frame doesn't carry it
 */

/** Heart Rate GATT service (0x180D). */
export const HEART_RATE_SERVICE_UUID = "180d";

/** Heart Rate Measurement characteristic (0x2A37). */
export const HEART_RATE_MEASUREMENT_UUID = "2a37";

/**
 * Sensor contact status, bits 1-2 of the flags byte.
 * Values 0 and 1 both mean the feature is not supported.
 */
export enum ContactSensorStatus {
	NotSupported = 0,
	NotSupported2 = 1,
	NoContact = 2,
	Contact = 3,
}

/** Bits of the measurement flags byte that carry meaning. */
export const HeartRateFlags = {
	None: 0,
	IsShort: 1,
	HasEnergyExpended: 1 << 3,
	HasRRInterval: 1 << 4,
} as const;

/** A successfully decoded Heart Rate Measurement frame. */
export interface HeartRateMeasurement {
	readonly isError: false;
	/** Raw flags byte, reserved bits included */
	readonly flags: number;
	readonly status: ContactSensorStatus;
	readonly beatsPerMinute: number;
	/** Accumulated energy in kilojoules, present iff flagged */
	readonly energyExpended?: number;
	/** RR intervals in 1/1024 s units, in frame order. Empty when not flagged. */
	readonly rrIntervals: readonly number[];
}

/**
 * A failure surfaced on the reading stream instead of being thrown,
 * so subscribers see faults in the same order as data.
 */
export interface HeartRateErrorReading {
	readonly isError: true;
	readonly error: string;
}

export type HeartRateReading = HeartRateMeasurement | HeartRateErrorReading;

/**
 * Which device to connect to. Without an address any device advertising
 * the heart-rate service is eligible.
 */
export interface DeviceTarget {
	/** 48-bit Bluetooth device address */
	address?: number;
}

/** Identity of a discovered or connected device, used for diagnostics. */
export interface HeartRateDeviceInfo {
	readonly id: string;
	readonly name: string | undefined;
	/** 48-bit address, when the platform exposes it */
	readonly address: number | undefined;
	readonly rssi: number | undefined;
}

/**
 * Outcome of writing the notify bit to the client characteristic
 * configuration descriptor.
 */
export type GattCommunicationStatus =
	| "success"
	| "unreachable"
	| "protocolError"
	| "accessDenied";

/**
 * A characteristic exposed by a connected device.
 */
export interface GattCharacteristic {
	readonly uuid: string;
	readonly properties: readonly string[];

	/** Writes the notify bit. Resolves with the acknowledgment status. */
	enableNotifications(): Promise<GattCommunicationStatus>;

	/** Clears the notify bit. Should be idempotent. */
	disableNotifications(): Promise<void>;

	/**
	 * Registers a callback for notified values.
	 * @returns A function to unregister the callback
	 */
	onValueChanged(callback: (data: Uint8Array) => void): () => void;
}

export interface GattService {
	readonly uuid: string;

	/** Resolves with `null` when the device doesn't expose the characteristic. */
	getCharacteristic(uuid: string): Promise<GattCharacteristic | null>;
}

/**
 * An open GATT session with one device.
 */
export interface GattSession {
	readonly device: HeartRateDeviceInfo;

	/** Resolves with `null` when the device doesn't expose the service. */
	getService(uuid: string): Promise<GattService | null>;

	/** Closes the session. Should be idempotent. */
	close(): Promise<void>;

	/**
	 * Registers a callback for unexpected disconnection.
	 * @returns A function to unregister the callback
	 */
	onDisconnect?(callback: () => void): () => void;
}

/** A device found during discovery that can be connected to. */
export interface HeartRateDeviceCandidate extends HeartRateDeviceInfo {
	/**
	 * Opens a GATT session. Resolves with `null` when the device
	 * can't be reached.
	 */
	openSession(): Promise<GattSession | null>;
}

/**
 * Hardware boundary. Implement this to run the client over another
 * Bluetooth stack; `createNobleBackend()` is the default.
 *
 * @example In-memory backend
 * ```typescript
 * const backend: HeartRateBackend = {
 *   async findDevices() {
 *     return [myCandidate];
 *   },
 * };
 * ```
 */
export interface HeartRateBackend {
	/**
	 * Resolves candidate devices. With an address, only that device;
	 * otherwise every device advertising the heart-rate service.
	 */
	findDevices(target: DeviceTarget): Promise<HeartRateDeviceCandidate[]>;
}
