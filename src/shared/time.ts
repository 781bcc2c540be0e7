/**
 * Time utilities — injectable clock for deterministic testing.
 *
 * Engine code asks Clock.now() once per operation instead of calling
 * Date.now() directly, so tests can move time without patching globals.
 */

/** Injectable time source in epoch milliseconds. */
export interface Clock {
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
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;

/** Whole seconds elapsed since the epoch, as used by interest accrual. */
export function unixSeconds(clock: Clock): bigint {
	const ms = clock.now();
	if (!Number.isSafeInteger(ms) || ms < 0) {
		throw new RangeError(`Clock returned an invalid timestamp: ${ms}`);
	}
	return BigInt(Math.floor(ms / 1_000));
}
