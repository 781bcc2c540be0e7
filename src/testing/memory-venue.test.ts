import { beforeEach, describe, expect, it } from "vitest";
import { TokenAmount } from "../math/fixed-point.js";
import { InvalidArgumentError, OrderRejectedError } from "../shared/errors.js";
import { authorityId, marketId, mintId, vaultId } from "../shared/identifiers.js";
import { err } from "../shared/result.js";
import { OrderSide } from "../venue/types.js";
import { MemoryLedger } from "./memory-ledger.js";
import { MemoryVenue } from "./memory-venue.js";

const MARKET = marketId("sol-usdc");
const SIGNER = authorityId("market");
const BASE = vaultId("market:base");
const QUOTE = vaultId("market:quote");

describe("MemoryVenue", () => {
	let ledger: MemoryLedger;
	let venue: MemoryVenue;

	beforeEach(() => {
		ledger = new MemoryLedger();
		ledger.createMint(mintId("sol"), authorityId("sol:issuer"));
		ledger.createMint(mintId("usdc"), authorityId("usdc:issuer"));
		ledger.createVault(BASE, mintId("sol"), SIGNER);
		ledger.createVault(QUOTE, mintId("usdc"), SIGNER);
		venue = new MemoryVenue(ledger);
		venue.listMarket({
			market: MARKET,
			baseMint: mintId("sol"),
			quoteMint: mintId("usdc"),
			lotSizes: { base: 10n, quote: 2n },
			price: 50n,
		});
		ledger.credit(QUOTE, 10_000n);
	});

	function bid(limitPrice: bigint, maxBaseQty: bigint, budget: bigint) {
		return venue.submitOrder({
			market: MARKET,
			side: OrderSide.Bid,
			limitPrice,
			maxBaseQty,
			maxNativeQuoteIncludingFees: TokenAmount.of(budget),
			payerVault: QUOTE,
			authority: SIGNER,
		});
	}

	it("fills a bid up to the budget and parks base until settle", async () => {
		// One lot costs 50 * 2 = 100 native quote.
		const fill = await bid(50n, 100n, 350n);
		expect(fill.ok).toBe(true);
		if (!fill.ok) return;
		expect(fill.value.filledBaseQty).toBe(3n);
		expect(fill.value.filledNativeQuote.raw).toBe(300n);
		expect(ledger.balanceOf(QUOTE)).toBe(9_700n);
		expect(ledger.balanceOf(BASE)).toBe(0n);

		const settled = await venue.settle({ market: MARKET, baseVault: BASE, quoteVault: QUOTE, authority: SIGNER });
		expect(settled.ok).toBe(true);
		expect(ledger.balanceOf(BASE)).toBe(30n);
	});

	it("leaves a bid under the price unfilled", async () => {
		const fill = await bid(49n, 1n, 10_000n);
		expect(fill.ok && fill.value.filledBaseQty).toBe(0n);
		expect(ledger.balanceOf(QUOTE)).toBe(10_000n);
	});

	it("caps fills at the configured depth", async () => {
		venue.setDepth(MARKET, 2n);
		const fill = await bid(60n, 10n, 10_000n);
		expect(fill.ok && fill.value.filledBaseQty).toBe(2n);
	});

	it("sells base at the current price", async () => {
		await bid(50n, 4n, 10_000n);
		await venue.settle({ market: MARKET, baseVault: BASE, quoteVault: QUOTE, authority: SIGNER });
		venue.setPrice(MARKET, 60n);

		const fill = await venue.submitOrder({
			market: MARKET,
			side: OrderSide.Ask,
			limitPrice: 55n,
			maxBaseQty: 4n,
			maxNativeQuoteIncludingFees: TokenAmount.ZERO,
			payerVault: BASE,
			authority: SIGNER,
		});
		expect(fill.ok).toBe(true);
		if (!fill.ok) return;
		expect(fill.value.filledNativeQuote.raw).toBe(480n);
		await venue.settle({ market: MARKET, baseVault: BASE, quoteVault: QUOTE, authority: SIGNER });
		expect(ledger.balanceOf(BASE)).toBe(0n);
		expect(ledger.balanceOf(QUOTE)).toBe(10_080n);
		expect(venue.orderLog()).toHaveLength(2);
	});

	it("drops an order from the log when the enclosing scope rolls back", async () => {
		const result = await ledger.atomic(async () => {
			const fill = await bid(50n, 2n, 1_000n);
			expect(fill.ok).toBe(true);
			return err(new InvalidArgumentError("later step failed"));
		});

		expect(result.ok).toBe(false);
		expect(venue.orderLog()).toHaveLength(0);
		expect(ledger.balanceOf(QUOTE)).toBe(10_000n);
	});

	it("rejects unknown markets and empty orders", async () => {
		const unknown = await venue.lotSizes(marketId("eth-usdc"));
		expect(unknown.ok).toBe(false);
		if (!unknown.ok) expect(unknown.error).toBeInstanceOf(OrderRejectedError);

		const empty = await bid(50n, 0n, 100n);
		expect(empty.ok).toBe(false);
		expect(venue.orderLog()).toHaveLength(0);
	});
});
