/**
 * Time utilities — injectable clock for deterministic testing.
 *
 * Settlement code reads time only through Clock, in whole unix seconds,
 * so tests can move across funding intervals without touching globals.
 */

/** Injectable time source -- all engine code depends on this instead of `Date.now()`. */
export interface Clock {
	/** Milliseconds since the unix epoch. */
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}

	/** Convenience for tests that think in block timestamps. */
	setSeconds(seconds: number): void {
		this.time = seconds * 1_000;
	}
}

/** Current time as whole unix seconds. */
export function unixSeconds(clock: Clock): number {
	return Math.floor(clock.now() / 1_000);
}

/**
 * Latest multiple of `intervalSeconds` at or before `timestamp`.
 * @example floorToInterval(7_250, 3_600) // 7_200
 */
export function floorToInterval(timestamp: number, intervalSeconds: number): number {
	return Math.floor(timestamp / intervalSeconds) * intervalSeconds;
}
