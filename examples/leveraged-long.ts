/**
 * Leveraged long — open a 3x long on an in-process venue, let interest
 * accrue for a day, then close after the price rises.
 *
 * Run: npx tsx examples/leveraged-long.ts
 */

import { Duration, Factor, createLogger, unwrap } from "../src/index.js";
import { poolFixture, testGovernance } from "../src/testing/index.js";

/** Roughly 5% a year, per second at Rate scale. */
const BASE_BORROW_RATE = 1_585_489_599_188_229_325n;

async function main(): Promise<void> {
	const logger = createLogger({ level: "info", name: "leveraged-long" });
	const fx = await poolFixture({
		governance: testGovernance({ baseBorrowRate: BASE_BORROW_RATE }),
		logger,
		price: 2_000n,
	});

	fx.engine.events.on("position_opened", (event) => {
		logger.info({ borrowed: event.borrowed.toString() }, "Position opened");
	});

	const opened = unwrap(
		await fx.engine.openPosition({
			marketId: fx.ids.market,
			trader: fx.ids.trader,
			source: fx.ids.traderQuote,
			limitPrice: 2_000n,
			baseQty: 100n,
			leverage: Factor.of(30_000),
		}),
	);
	logger.info(
		{ baseFilled: opened.baseFilled.toString(), quoteSpent: opened.quoteSpent.toString() },
		"Bought base with borrowed quote",
	);

	fx.clock.advance(Duration.days(1));
	fx.venue.setPrice(fx.ids.market, 2_200n);

	const closed = unwrap(
		await fx.engine.closePosition({
			marketId: fx.ids.market,
			trader: fx.ids.trader,
			destination: fx.ids.traderQuote,
			limitPrice: 2_200n,
			baseQty: opened.baseFilled.raw,
		}),
	);
	logger.info(
		{
			proceeds: closed.proceeds.toString(),
			debtRepaid: closed.debtRepaid.toString(),
			returnedToTrader: closed.returnedToTrader.toString(),
		},
		"Position closed",
	);

	const metrics = unwrap(await fx.engine.reserveMetrics(fx.ids.reserve));
	logger.info(
		{
			utilization: metrics.utilization,
			borrowApr: metrics.borrowApr,
			totalLiquidity: metrics.totalLiquidity.toString(),
		},
		"Reserve after close",
	);
}

main().catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
