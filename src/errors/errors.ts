import type { GattCommunicationStatus } from "../types";

export type HeartRateServiceErrorKind =
	| "discoveryFailed"
	| "connectionFailed"
	| "configurationFailed"
	| "disposed";

/**
 * Base class for failures reported by `connect()`.
 * The `kind` discriminant lets callers switch without instanceof chains.
 */
export abstract class HeartRateServiceError extends Error {
	abstract readonly kind: HeartRateServiceErrorKind;
}

/**
 * No eligible device was found.
 */
export class DiscoveryFailedError extends HeartRateServiceError {
	readonly kind = "discoveryFailed";

	constructor(
		public readonly explicitTarget: boolean,
		options?: { cause?: unknown },
	) {
		super(
			explicitTarget
				? "Unable to locate the configured heart rate device. Ensure it's connected and paired, or remove the address from settings."
				: "Unable to locate heart rate device. Ensure it's connected and paired.",
			options,
		);
		this.name = "DiscoveryFailedError";
	}
}

/** Which part of GATT resolution failed. */
export type ConnectionStep = "device" | "service" | "characteristic";

/**
 * The device was unreachable, or didn't expose the heart-rate
 * service or measurement characteristic.
 */
export class ConnectionFailedError extends HeartRateServiceError {
	readonly kind = "connectionFailed";

	constructor(
		public readonly step: ConnectionStep,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConnectionFailedError";
	}
}

/**
 * Enabling notifications was not acknowledged as success.
 */
export class ConfigurationFailedError extends HeartRateServiceError {
	readonly kind = "configurationFailed";

	constructor(public readonly status: GattCommunicationStatus) {
		super(`Attempt to configure service failed: ${status}`);
		this.name = "ConfigurationFailedError";
	}
}

/**
 * The service was disposed before or during the operation.
 */
export class DisposedError extends HeartRateServiceError {
	readonly kind = "disposed";

	constructor() {
		super("Heart rate service has been disposed");
		this.name = "DisposedError";
	}
}

/**
 * Custom error class for timeout operations.
 *
 * Note: The underlying BLE operation may still complete in the background
 * after a timeout is thrown.
 */
export class TimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Normalizes any thrown value into an Error instance.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't settle within the specified time,
 * rejects with a TimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 *
 * @param label - Descriptive label for the operation (used in error message)
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timeoutId = setTimeout(() => {
			reject(new TimeoutError(label, ms));
		}, ms);

		promise
			.then((value) => {
				clearTimeout(timeoutId);
				resolve(value);
			})
			.catch((error: unknown) => {
				clearTimeout(timeoutId);
				reject(error);
			});
	});
}
