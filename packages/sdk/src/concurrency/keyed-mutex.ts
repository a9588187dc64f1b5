/**
 * Keyed Mutex
 *
 * Serialises async critical sections that share a key while letting
 * sections on different keys run concurrently. Each key holds a promise
 * chain; a waiter starts once every earlier holder of that key settles.
 */

export class KeyedMutex {
	private readonly tails: Map<string, Promise<void>> = new Map();

	/**
	 * Run `fn` once all earlier sections for `key` have finished.
	 *
	 * The lock is released whether `fn` resolves or throws, and the result
	 * or error of `fn` is passed through unchanged.
	 */
	async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();

		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await fn();
		} finally {
			release();
			// Nobody queued behind us: forget the key
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/**
	 * Whether a section currently holds or waits on `key`.
	 */
	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}
