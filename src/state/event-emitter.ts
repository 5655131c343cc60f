import { createConsoleLogger, type Logger } from "../logging/logger";

export type EventMap = { [key: string]: unknown };

type Listener = (data: unknown) => void;

/**
 * A type-safe observer list. Every registered listener receives every
 * emitted event independently; one listener throwing doesn't stop the
 * others.
 *
 * @example
 * ```typescript
 * interface MonitorEvents {
 *   reading: HeartRateReading;
 * }
 *
 * const emitter = createEventEmitter<MonitorEvents>();
 * const unsubscribe = emitter.on("reading", (reading) => {
 *   if (!reading.isError) console.log(reading.beatsPerMinute);
 * });
 *
 * emitter.emit("reading", { isError: true, error: "Device not found" });
 * unsubscribe();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

export interface EventEmitterOptions {
	/** Receives listener failures. */
	logger?: Logger;
}

export function createEventEmitter<T extends EventMap>(
	options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
	const logger =
		options.logger ?? createConsoleLogger("[hr-ble-client:event-emitter]");
	// Registered callback -> listener actually stored (differs for once)
	const listeners = new Map<keyof T, Map<Listener, Listener>>();

	function listenersFor<K extends keyof T>(event: K): Map<Listener, Listener> {
		let registered = listeners.get(event);
		if (!registered) {
			registered = new Map();
			listeners.set(event, registered);
		}
		return registered;
	}

	function off<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): void {
		const registered = listeners.get(event);
		if (!registered) return;
		registered.delete(callback as Listener);
		if (registered.size === 0) {
			listeners.delete(event);
		}
	}

	function on<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		listenersFor(event).set(callback as Listener, callback as Listener);
		return () => off(event, callback);
	}

	function once<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		const wrapper: Listener = (data) => {
			off(event, callback);
			callback(data as T[K]);
		};
		listenersFor(event).set(callback as Listener, wrapper);
		return () => off(event, callback);
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event !== undefined) {
			listeners.delete(event);
		} else {
			listeners.clear();
		}
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const registered = listeners.get(event);
		if (!registered) return;

		// Snapshot so listeners can unsubscribe while being called
		for (const listener of [...registered.values()]) {
			try {
				listener(data);
			} catch (err) {
				logger.error("Listener threw an error:", err);
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return listeners.get(event)?.size ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
