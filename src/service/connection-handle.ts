import { describeError, type Logger } from "../logging/logger";
import type {
	GattCharacteristic,
	GattCommunicationStatus,
	GattSession,
	HeartRateDeviceInfo,
} from "../types";
import type { Releasable } from "./handle-holder";

/**
 * Everything held open for one connected device: the GATT session, the
 * measurement characteristic once resolved, and the listeners registered
 * on them. Releasing it undoes all of that, in reverse order.
 */
export interface ConnectionHandle extends Releasable {
	readonly device: HeartRateDeviceInfo;
	readonly session: GattSession;
	readonly released: boolean;

	/**
	 * Enables notifications on `characteristic` and binds it to this handle.
	 * Notifications are only disabled on release if this reported success.
	 */
	subscribe(characteristic: GattCharacteristic): Promise<GattCommunicationStatus>;

	/**
	 * Routes notified values of the bound characteristic to `listener`.
	 * @throws Error if no characteristic has been subscribed
	 */
	attach(listener: (data: Uint8Array) => void): void;
}

export interface ConnectionHandleOptions {
	session: GattSession;
	logger: Logger;
	/** Called when the device drops the connection while this handle is live */
	onUnexpectedDisconnect?: (device: HeartRateDeviceInfo) => void;
}

export function createConnectionHandle(
	options: ConnectionHandleOptions,
): ConnectionHandle {
	const { session, logger, onUnexpectedDisconnect } = options;
	const device = session.device;

	let characteristic: GattCharacteristic | null = null;
	let subscribed = false;
	let released = false;
	let detachValueListener: (() => void) | null = null;

	const detachDisconnectListener =
		session.onDisconnect?.(() => {
			if (!released) {
				onUnexpectedDisconnect?.(device);
			}
		}) ?? null;

	async function subscribe(
		target: GattCharacteristic,
	): Promise<GattCommunicationStatus> {
		characteristic = target;
		const status = await target.enableNotifications();
		subscribed = status === "success";
		return status;
	}

	function attach(listener: (data: Uint8Array) => void): void {
		if (!characteristic) {
			throw new Error("Cannot attach a listener before subscribing");
		}
		detachValueListener?.();
		detachValueListener = characteristic.onValueChanged(listener);
	}

	async function release(): Promise<void> {
		if (released) return;
		released = true;

		detachValueListener?.();
		detachValueListener = null;
		detachDisconnectListener?.();

		if (characteristic && subscribed) {
			subscribed = false;
			try {
				await characteristic.disableNotifications();
			} catch (e) {
				logger.warn(
					`Error stopping notifications on ${device.id}:`,
					describeError(e),
				);
			}
		}

		try {
			await session.close();
		} catch (e) {
			logger.warn(`Error closing session to ${device.id}:`, describeError(e));
		}
	}

	return {
		device,
		session,
		get released(): boolean {
			return released;
		},
		subscribe,
		attach,
		release,
	};
}
