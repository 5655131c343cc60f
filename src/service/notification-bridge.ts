import { decodeHeartRateMeasurement } from "../decoder/frame-decoder";
import { createNoOpLogger, type Logger } from "../logging/logger";
import type { HeartRateMeasurement } from "../types";
import { copyInto } from "../utils/buffer";

export interface NotificationBridgeOptions {
	/** Receives every successfully decoded measurement */
	publish: (reading: HeartRateMeasurement) => void;
	logger?: Logger;
}

/**
 * Turns raw characteristic notifications into measurements.
 */
export interface NotificationBridge {
	/** Handles one raw notification payload. */
	handleNotification(payload: Uint8Array): void;

	/** How many times the scratch buffer has been (re)allocated. */
	readonly bufferAllocations: number;
}

/**
 * Creates a notification bridge with one reusable scratch buffer.
 *
 * The buffer is sized to the most recent payload and reallocated only when
 * the length changes. It is out of its slot for the duration of a decode
 * and is put back even if `publish` throws.
 *
 * Frames that fail to decode are logged and dropped.
 */
export function createNotificationBridge(
	options: NotificationBridgeOptions,
): NotificationBridge {
	const { publish, logger = createNoOpLogger() } = options;

	let scratch: Uint8Array | null = null;
	let bufferAllocations = 0;

	function handleNotification(payload: Uint8Array): void {
		if (payload.length === 0) return;

		let buffer = scratch;
		scratch = null;

		if (buffer === null || buffer.length !== payload.length) {
			buffer = new Uint8Array(payload.length);
			bufferAllocations++;
		}

		try {
			const length = copyInto(buffer, payload);
			const reading = decodeHeartRateMeasurement(buffer, length);

			if (reading === null) {
				logger.debug(`Buffer was too small. Got ${length}.`);
				return;
			}

			publish(reading);
		} finally {
			scratch = buffer;
		}
	}

	return {
		handleNotification,
		get bufferAllocations(): number {
			return bufferAllocations;
		},
	};
}
