import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Rate, Ray, TokenAmount } from "../math/fixed-point.js";
import { type BorrowRateCurve, borrowRate, utilization } from "./borrow-rate.js";

const curve: BorrowRateCurve = {
	baseBorrowRate: Rate.of(100_000_000_000_000_000n),
	optimalSlope: Ray.of(1_000_000_000n),
	excessSlope: Ray.of(10_000_000_000n),
	optimalUtilization: Ray.of(800_000_000_000_000_000n),
};

const amt = (n: number) => TokenAmount.of(n);

describe("utilization", () => {
	it("is debt over debt plus liquidity", () => {
		expect(utilization(amt(200_000), amt(800_000)).raw).toBe(200_000_000_000_000_000n);
		expect(utilization(amt(5), amt(0)).eq(Ray.ONE)).toBe(true);
	});

	it("is zero for an empty pool", () => {
		expect(utilization(amt(0), amt(0)).isZero()).toBe(true);
	});
});

describe("borrowRate", () => {
	it("charges the base rate on an empty pool", () => {
		expect(borrowRate(amt(0), amt(0), curve).raw).toBe(100_000_000_000_000_000n);
	});

	it("climbs along the optimal slope below the kink", () => {
		expect(borrowRate(amt(200_000), amt(800_000), curve).raw).toBe(350_000_000_000_000_000n);
	});

	it("equals base plus optimal slope at the kink", () => {
		const atKink = borrowRate(amt(800_000), amt(200_000), curve);
		expect(atKink.raw).toBe(1_100_000_000_000_000_000n);
		expect(atKink.intoRay().eq(curve.baseBorrowRate.intoRay().add(curve.optimalSlope))).toBe(true);
	});

	it("climbs along the excess slope above the kink", () => {
		expect(borrowRate(amt(900_000), amt(100_000), curve).raw).toBe(6_100_000_000_000_000_000n);
	});
});

describe("borrowRate (property-based)", () => {
	it("never decreases as debt grows in a fixed-size pool", () => {
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 999_999 }), (debt) => {
				const lower = borrowRate(amt(debt), amt(1_000_000 - debt), curve);
				const higher = borrowRate(amt(debt + 1), amt(999_999 - debt), curve);
				expect(higher.gte(lower)).toBe(true);
			}),
			{ numRuns: 1000 },
		);
	});

	it("stays within [base, base + optimal + excess]", () => {
		const ceiling = curve.baseBorrowRate.intoRay().add(curve.optimalSlope).add(curve.excessSlope).asRate();
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 1_000_000 }), fc.integer({ min: 0, max: 1_000_000 }), (d, l) => {
				const rate = borrowRate(amt(d), amt(l), curve);
				expect(rate.gte(curve.baseBorrowRate)).toBe(true);
				expect(rate.lte(ceiling)).toBe(true);
			}),
			{ numRuns: 1000 },
		);
	});
});
