import { beforeEach, describe, expect, it } from "vitest";
import { Factor, TokenAmount } from "../math/fixed-point.js";
import { InvalidLeverageError } from "../shared/errors.js";
import { type PoolFixture, poolFixture } from "../testing/pool-fixture.js";

describe("concurrent operations", () => {
	let fx: PoolFixture;

	beforeEach(async () => {
		fx = await poolFixture();
		fx.ledger.credit(fx.ids.investorQuote, 200_000n);
	});

	function depositOf(amount: number) {
		return fx.engine.deposit({
			reserveId: fx.ids.reserve,
			investor: fx.ids.investor,
			source: fx.ids.investorQuote,
			redeemableVault: fx.ids.investorLp,
			amount: TokenAmount.of(amount),
		});
	}

	it("keeps a deposit when a rejected open runs beside it", async () => {
		const [deposited, opened] = await Promise.all([
			depositOf(100_000),
			fx.engine.openPosition({
				marketId: fx.ids.market,
				trader: fx.ids.trader,
				source: fx.ids.traderQuote,
				limitPrice: 2_000n,
				baseQty: 100n,
				leverage: Factor.of(99_999_999),
			}),
		]);

		expect(deposited.ok).toBe(true);
		expect(opened.ok).toBe(false);
		if (!opened.ok) expect(opened.error).toBeInstanceOf(InvalidLeverageError);
		expect(fx.balance(fx.ids.reserveVault)).toBe(1_100_000n);
		expect(fx.balance(fx.ids.investorLp)).toBe(1_100_000n);
		expect(fx.balance(fx.ids.investorQuote)).toBe(100_000n);
	});

	it("applies both of two overlapping deposits", async () => {
		const results = await Promise.all([depositOf(100_000), depositOf(100_000)]);

		expect(results.map((r) => r.ok)).toEqual([true, true]);
		expect(fx.balance(fx.ids.reserveVault)).toBe(1_200_000n);
		expect(fx.balance(fx.ids.investorLp)).toBe(1_200_000n);
		expect(fx.ledger.supplyOf(fx.ids.lpMint)).toBe(1_200_000n);
	});
});
