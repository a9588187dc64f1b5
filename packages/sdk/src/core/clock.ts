/**
 * Clock sources.
 *
 * Time is expressed in whole unix seconds, the resolution ledgers use for
 * block timestamps.
 */

export interface Clock {
	/** Current unix time in seconds */
	now(): number;
}

export const systemClock: Clock = {
	now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock(1_700_000_000);
 * clock.advance(3600);
 * clock.now(); // 1_700_003_600
 * ```
 */
export class ManualClock implements Clock {
	constructor(private current: number = 0) {}

	now(): number {
		return this.current;
	}

	set(timestamp: number): void {
		if (timestamp < this.current) {
			throw new Error(
				`Clock cannot move backwards (${timestamp} < ${this.current})`,
			);
		}
		this.current = timestamp;
	}

	advance(seconds: number): void {
		this.set(this.current + seconds);
	}
}
