import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Rate, Ray } from "../math/fixed-point.js";
import { UnixTimestamp } from "../math/timestamp.js";
import { ComputationFault } from "../shared/errors.js";
import { calculateCompounded } from "./compound.js";

// 1e-9 per second
const RATE = Rate.of(1_000_000_000_000_000_000n);
const ts = (s: number | bigint) => UnixTimestamp.of(s);
const HUGE_RATE = 1n << 127n;

describe("calculateCompounded", () => {
	it("returns ONE when no time has elapsed", () => {
		expect(calculateCompounded(RATE, ts(100), ts(100)).eq(Ray.ONE)).toBe(true);
	});

	it("returns ONE for a zero rate", () => {
		expect(calculateCompounded(Rate.ZERO, ts(0), ts(86_400)).eq(Ray.ONE)).toBe(true);
	});

	it("is linear for a single second", () => {
		expect(calculateCompounded(RATE, ts(0), ts(1)).raw).toBe(1_000_000_001_000_000_000n);
	});

	it("adds the quadratic term after two seconds", () => {
		expect(calculateCompounded(RATE, ts(0), ts(2)).raw).toBe(1_000_000_002_000_000_001n);
	});

	it("drops terms that round to zero", () => {
		expect(calculateCompounded(RATE, ts(50), ts(60)).raw).toBe(1_000_000_010_000_000_045n);
	});

	it("faults when time runs backwards", () => {
		expect(() => calculateCompounded(RATE, ts(10), ts(5))).toThrow(ComputationFault);
		expect(() => calculateCompounded(RATE, ts(10), ts(5))).toThrow("Invalid timestamps");
	});

	it("faults instead of wrapping on overflow", () => {
		expect(() => calculateCompounded(Rate.of(HUGE_RATE), ts(0), ts(2n ** 63n))).toThrow(ComputationFault);
	});
});

describe("calculateCompounded (property-based)", () => {
	it("is monotonic in elapsed time", () => {
		fc.assert(
			fc.property(
				fc.bigInt({ min: 1n, max: 100_000_000_000_000_000_000n }),
				fc.bigInt({ min: 0n, max: 100_000_000n }),
				fc.bigInt({ min: 0n, max: 100_000_000n }),
				(rate, d1, d2) => {
					const start = ts(1_700_000_000);
					const [near, far] = d1 <= d2 ? [d1, d2] : [d2, d1];
					const a = calculateCompounded(Rate.of(rate), start, ts(1_700_000_000n + near));
					const b = calculateCompounded(Rate.of(rate), start, ts(1_700_000_000n + far));
					expect(b.gte(a)).toBe(true);
					expect(a.gte(Ray.ONE)).toBe(true);
				},
			),
			{ numRuns: 500 },
		);
	});
});
