/**
 * A resource that must be released exactly once.
 */
export interface Releasable {
	release(): Promise<void>;
}

/**
 * Owns at most one live resource. The resource is only ever replaced,
 * never mutated in place, and the previous one is fully released before
 * its replacement becomes visible.
 */
export interface HandleHolder<T extends Releasable> {
	/** The installed resource, or null. */
	current(): T | null;

	/** Whether `handle` is the installed resource. */
	isCurrent(handle: T): boolean;

	/**
	 * Detaches and returns the installed resource without releasing it.
	 * The holder is empty afterwards.
	 */
	take(): T | null;

	/**
	 * Releases the installed resource, if any, then installs `next`.
	 */
	replace(next: T): Promise<void>;

	/**
	 * Takes and releases the installed resource. Idempotent.
	 */
	release(): Promise<void>;
}

export function createHandleHolder<T extends Releasable>(): HandleHolder<T> {
	let handle: T | null = null;

	function take(): T | null {
		const previous = handle;
		handle = null;
		return previous;
	}

	async function release(): Promise<void> {
		const previous = take();
		if (previous) {
			await previous.release();
		}
	}

	return {
		current: () => handle,
		isCurrent: (candidate) => handle !== null && handle === candidate,
		take,
		async replace(next: T): Promise<void> {
			await release();
			handle = next;
		},
		release,
	};
}
