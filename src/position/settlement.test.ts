import { describe, expect, it } from "vitest";
import { TokenAmount } from "../math/fixed-point.js";
import { testGovernance } from "../testing/governance.js";
import {
	liquidationCost,
	liquidationPayout,
	liquidationReward,
	settleRepayment,
} from "./settlement.js";

const amt = (n: number) => TokenAmount.of(n);
// 5% margin, 2% reward, no cap
const gov = testGovernance();
const capped = testGovernance({ maxLiquidationReward: 1_500n });

describe("settleRepayment", () => {
	it("repays the full debt and releases the whole loan when proceeds cover it", () => {
		const repayment = settleRepayment(amt(200_000), amt(210_000), amt(200_000));

		expect(repayment.debtChange.raw).toBe(200_000n);
		expect(repayment.loanChange.raw).toBe(200_000n);
	});

	it("releases a pro-rata share of the loan on a shortfall", () => {
		// 150_000 / 200_000 of a 180_000 loan
		const repayment = settleRepayment(amt(200_000), amt(150_000), amt(180_000));

		expect(repayment.debtChange.raw).toBe(150_000n);
		expect(repayment.loanChange.raw).toBe(135_000n);
	});
});

describe("liquidationCost", () => {
	it("adds the margin to the current debt", () => {
		expect(liquidationCost(amt(200_000), gov).raw).toBe(210_000n);
	});
});

describe("liquidationReward", () => {
	it("is a percentage of the proceeds", () => {
		expect(liquidationReward(amt(100_000), gov).raw).toBe(2_000n);
	});

	it("is capped when a cap is set", () => {
		expect(liquidationReward(amt(100_000), capped).raw).toBe(1_500n);
		expect(liquidationReward(amt(50_000), capped).raw).toBe(1_000n);
	});
});

describe("liquidationPayout", () => {
	it("pays reward, then debt, then the surplus to the trader", () => {
		const payout = liquidationPayout(amt(205_000), amt(200_000), gov);

		expect(payout.reward.raw).toBe(4_100n);
		expect(payout.toReserve.raw).toBe(200_000n);
		expect(payout.toTrader.raw).toBe(900n);
	});

	it("sends everything left to the reserve on a shortfall", () => {
		const payout = liquidationPayout(amt(204_000), amt(200_000), gov);

		expect(payout.reward.raw).toBe(4_080n);
		expect(payout.toReserve.raw).toBe(199_920n);
		expect(payout.toTrader.isZero()).toBe(true);
	});

	it("sends everything left to the reserve when it exactly covers the debt", () => {
		const payout = liquidationPayout(amt(204_082), amt(200_000), gov);

		expect(payout.reward.raw).toBe(4_082n);
		expect(payout.toReserve.raw).toBe(200_000n);
		expect(payout.toTrader.isZero()).toBe(true);
	});
});
