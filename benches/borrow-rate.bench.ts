import { bench, describe } from "vitest";
import { borrowRate } from "../src/interest/borrow-rate.js";
import { Rate, Ray, TokenAmount } from "../src/math/fixed-point.js";

describe("borrow rate curve", () => {
	const curve = {
		baseBorrowRate: Rate.of(634_195_839_675_291_000n),
		excessSlope: Ray.of(31_709_791_983n),
		optimalSlope: Ray.of(1_268_391_679n),
		optimalUtilization: Ray.of(800_000_000_000_000_000n),
	};
	const liquidity = TokenAmount.of(1_000_000_000_000n);

	bench("below optimal 1000x", () => {
		const debt = TokenAmount.of(400_000_000_000n);
		for (let i = 0; i < 1000; i++) {
			borrowRate(debt, liquidity, curve);
		}
	});

	bench("above optimal 1000x", () => {
		const debt = TokenAmount.of(9_000_000_000_000n);
		for (let i = 0; i < 1000; i++) {
			borrowRate(debt, liquidity, curve);
		}
	});
});
