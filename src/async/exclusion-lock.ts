/**
 * An async mutual-exclusion lock built on a promise chain.
 *
 * Sections passed to `runExclusive` run one at a time in the order they
 * were requested, even when they await hardware operations in between.
 *
 * @example Serializing handle replacement
 * ```typescript
 * const lock = createExclusionLock();
 *
 * // These never interleave, even though both await
 * await Promise.all([
 *   lock.runExclusive(() => replaceHandle(a)),
 *   lock.runExclusive(() => replaceHandle(b)),
 * ]);
 * ```
 */
export interface ExclusionLock {
	/**
	 * Runs `section` once every previously requested section has settled.
	 * A section that throws releases the lock and rejects only its own caller.
	 */
	runExclusive<T>(section: () => Promise<T> | T): Promise<T>;
}

export function createExclusionLock(): ExclusionLock {
	// Tail of the chain - acts as the mutex
	let tail: Promise<void> = Promise.resolve();

	function runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
		const result = tail.then(() => section());

		// The next section waits for this one to settle, whatever the outcome.
		tail = result.then(
			() => {},
			() => {},
		);

		return result;
	}

	return { runExclusive };
}
