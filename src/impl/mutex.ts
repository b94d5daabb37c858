/**
 * FIFO async mutex.
 *
 * Used wherever a single connection or a single shared slot must not be
 * entered by two logically concurrent callers.
 */
export class Mutex {
	#tail: Promise<void> = Promise.resolve();
	#locked = false;

	get locked(): boolean {
		return this.#locked;
	}

	/**
	 * Wait for the lock. The returned function releases it; calling it more
	 * than once has no further effect.
	 */
	async acquire(): Promise<() => void> {
		let release: () => void = () => {};
		const next = new Promise<void>((resolve) => {
			release = resolve;
		});
		const previous = this.#tail;
		this.#tail = previous.then(() => next);
		await previous;
		this.#locked = true;

		let released = false;
		return () => {
			if (released) return;
			released = true;
			this.#locked = false;
			release();
		};
	}

	/**
	 * Run fn while holding the lock.
	 */
	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		const release = await this.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}
}
