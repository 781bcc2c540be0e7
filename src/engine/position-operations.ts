/**
 * Leveraged position operations: open, close and liquidate.
 *
 * Token flow of an open:
 *
 *   reserve vault ──loan──▶ market quote vault ◀──margin── trader
 *                                 │ bid
 *                                 ▼
 *               venue ──base──▶ market base vault, receipts ──▶ position
 *
 * Unspent quote goes back to the reserve first (shrinking the loan before it
 * becomes debt) and then to the trader. Close and liquidate run the flow in
 * reverse: burn receipts, sell base, repay the reserve, pay out the rest.
 *
 * Every step that touches custody or the venue returns early on `err`; the
 * engine's atomic scope reverts whatever already moved.
 */

import type { Governance } from "../governance/governance.js";
import { type Factor, TokenAmount } from "../math/fixed-point.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import {
	borrowLimit,
	borrowedBaseQty,
	checkLeverage,
	rateMultiplier,
	withinBorrowLimit,
} from "../position/leverage.js";
import { positionDebt } from "../position/position-debt.js";
import { liquidationCost, liquidationPayout, settleRepayment } from "../position/settlement.js";
import { statusAfterClose, tryTransition } from "../position/status.js";
import {
	type MarketRecord,
	type PositionRecord,
	type PositionState,
	PositionStatus,
} from "../position/types.js";
import {
	accrueTreasury,
	availableLiquidity,
	type DebtChange,
	decreaseDebt,
	increaseDebt,
	projectTotalDebt,
	refreshBorrowRate,
} from "../reserve/reserve-accounting.js";
import type { ReserveRecord } from "../reserve/types.js";
import {
	BorrowLimitExceededError,
	InvalidArgumentError,
	LiquidateHealthyPositionError,
	OrderRejectedError,
	type PoolError,
} from "../shared/errors.js";
import { traderAuthority } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { nativeBaseQty, nativeQuoteQty, wholeBaseLots } from "../venue/lots.js";
import { type Fill, OrderSide } from "../venue/types.js";
import {
	type OperationContext,
	type OperationResult,
	loadPositionScope,
	requirePositive,
	transferIfAny,
} from "./context.js";
import type {
	ClosePositionReceipt,
	ClosePositionRequest,
	LiquidatePositionRequest,
	LiquidationReceipt,
	OpenPositionReceipt,
	OpenPositionRequest,
} from "./types.js";

/** Forced unwinds sell at the lowest possible limit price. */
const LIQUIDATION_LIMIT_PRICE = 1n;

// ── Open ─────────────────────────────────────────────────────────────

export async function openPosition(
	ctx: OperationContext,
	request: OpenPositionRequest,
): OperationResult<OpenPositionReceipt> {
	const positive = requirePositive({ limitPrice: request.limitPrice, baseQty: request.baseQty });
	if (!positive.ok) return positive;

	const scope = await loadPositionScope(ctx.store, request.marketId, request.trader);
	if (!scope.ok) return scope;
	const { reserve, market, position } = scope.value;

	const transition = tryTransition(position.status, PositionStatus.Open);
	if (!transition.ok) return transition;
	const leverage = checkLeverage(request.leverage, ctx.governance);
	if (!leverage.ok) return leverage;

	const loanLots = borrowedBaseQty(request.leverage, request.baseQty);
	const totalLots = request.baseQty + loanLots;

	const sizes = await ctx.venue.lotSizes(market.id);
	if (!sizes.ok) return sizes;
	const loanQuote = nativeQuoteQty(request.limitPrice, loanLots, sizes.value);
	const totalQuote = nativeQuoteQty(request.limitPrice, totalLots, sizes.value);
	if (nativeBaseQty(totalLots, sizes.value) === null || loanQuote === null || totalQuote === null) {
		return err(
			new InvalidArgumentError("Order size exceeds the native token range", {
				limitPrice: request.limitPrice.toString(),
				baseQty: totalLots.toString(),
			}),
		);
	}

	const vaultStart = await ctx.custodian.balance(reserve.lendableVault);
	if (!vaultStart.ok) return vaultStart;

	const lent = await transferIfAny(ctx.custodian, {
		from: reserve.lendableVault,
		to: market.quoteVault,
		authority: reserve.signer,
		amount: loanQuote,
	});
	if (!lent.ok) return lent;

	const margin = await transferIfAny(ctx.custodian, {
		from: request.source,
		to: market.quoteVault,
		authority: traderAuthority(request.trader),
		amount: totalQuote.sub(loanQuote),
	});
	if (!margin.ok) return margin;

	const fill = await trade(ctx, market, {
		side: OrderSide.Bid,
		limitPrice: request.limitPrice,
		maxBaseQty: totalLots,
		maxNativeQuote: totalQuote,
	});
	if (!fill.ok) return fill;

	const marketQuote = await ctx.custodian.balance(market.quoteVault);
	if (!marketQuote.ok) return marketQuote;
	const returned = loanQuote.min(marketQuote.value);
	const refunded = await transferIfAny(ctx.custodian, {
		from: market.quoteVault,
		to: reserve.lendableVault,
		authority: market.signer,
		amount: returned,
	});
	if (!refunded.ok) return refunded;
	const loan = loanQuote.sub(returned);

	let nextReserve = reserve;
	let nextMarket = market;
	let state = position.state;
	if (!loan.isZero()) {
		const totalLoan = market.state.totalLoan.add(loan);
		const totalDebt = projectTotalDebt(reserve.debt, ctx.timestamp);
		const totalLiquidity = availableLiquidity(reserve, totalDebt, vaultStart.value);
		if (!withinBorrowLimit(totalLoan, ctx.governance, totalLiquidity)) {
			return err(
				new BorrowLimitExceededError("Borrow limit exceeded", {
					totalLoan: totalLoan.toString(),
					borrowLimit: borrowLimit(ctx.governance, totalLiquidity).toString(),
				}),
			);
		}

		const borrowed = borrowFromReserve(
			reserve,
			state,
			ctx,
			{ vaultStart: vaultStart.value, totalDebt, amount: loan },
			rateMultiplier(request.leverage, ctx.governance),
		);
		nextReserve = borrowed.reserve;
		state = { ...borrowed.position, loan: state.loan.add(loan) };
		nextMarket = { ...market, state: { ...market.state, totalLoan } };
	}

	const dust = await transferIfAny(ctx.custodian, {
		from: market.quoteVault,
		to: request.source,
		authority: market.signer,
		amount: marketQuote.value.sub(returned),
	});
	if (!dust.ok) return dust;

	const baseFilled = nativeBaseQty(fill.value.filledBaseQty, sizes.value);
	if (baseFilled === null) {
		return err(
			new InvalidArgumentError("Filled quantity exceeds the native token range", {
				filledBaseQty: fill.value.filledBaseQty.toString(),
			}),
		);
	}
	const minted = await ctx.custodian.mint({
		mint: market.receiptMint,
		to: position.receiptAccount,
		authority: market.signer,
		amount: baseFilled,
	});
	if (!minted.ok) return minted;

	const next: PositionRecord = { ...position, status: transition.value, state };
	return ok({
		value: { position: next, baseFilled, quoteSpent: fill.value.filledNativeQuote, borrowed: loan },
		changes: { reserves: [nextReserve], markets: [nextMarket], positions: [next] },
		event: {
			type: "position_opened",
			timestamp: ctx.timestamp,
			marketId: market.id,
			trader: position.trader,
			leverage: request.leverage,
			baseFilled,
			quoteSpent: fill.value.filledNativeQuote,
			borrowed: loan,
			rate: state.rate,
		},
		fields: { leverage: request.leverage, baseFilled, borrowed: loan },
	});
}

// ── Close ────────────────────────────────────────────────────────────

/**
 * Sell `baseQty` lots and repay as much debt as the proceeds cover. The
 * position ends `closed` only when neither debt nor receipts remain.
 */
export async function closePosition(
	ctx: OperationContext,
	request: ClosePositionRequest,
): OperationResult<ClosePositionReceipt> {
	const positive = requirePositive({ limitPrice: request.limitPrice, baseQty: request.baseQty });
	if (!positive.ok) return positive;

	const scope = await loadPositionScope(ctx.store, request.marketId, request.trader);
	if (!scope.ok) return scope;
	const { reserve, market, position } = scope.value;

	const transition = tryTransition(position.status, PositionStatus.Closed);
	if (!transition.ok) return transition;

	const sizes = await ctx.venue.lotSizes(market.id);
	if (!sizes.ok) return sizes;
	const nativeBase = nativeBaseQty(request.baseQty, sizes.value);
	const totalQuote = nativeQuoteQty(request.limitPrice, request.baseQty, sizes.value);
	if (nativeBase === null || totalQuote === null) {
		return err(
			new InvalidArgumentError("Order size exceeds the native token range", {
				limitPrice: request.limitPrice.toString(),
				baseQty: request.baseQty.toString(),
			}),
		);
	}

	const vaultStart = await ctx.custodian.balance(reserve.lendableVault);
	if (!vaultStart.ok) return vaultStart;

	const burned = await ctx.custodian.burn({
		mint: market.receiptMint,
		from: position.receiptAccount,
		authority: market.signer,
		amount: nativeBase,
	});
	if (!burned.ok) return burned;

	const fill = await trade(ctx, market, {
		side: OrderSide.Ask,
		limitPrice: request.limitPrice,
		maxBaseQty: request.baseQty,
		maxNativeQuote: totalQuote,
	});
	if (!fill.ok) return fill;

	const proceeds = await ctx.custodian.balance(market.quoteVault);
	if (!proceeds.ok) return proceeds;

	let nextReserve = reserve;
	let nextMarket = market;
	let state = position.state;
	let debtRepaid = TokenAmount.ZERO;
	let loanReleased = TokenAmount.ZERO;
	const currentDebt = positionDebt(state, ctx.timestamp);
	if (!currentDebt.isZero()) {
		const repayment = settleRepayment(currentDebt, proceeds.value, state.loan);
		debtRepaid = repayment.debtChange;
		loanReleased = repayment.loanChange;
		nextMarket = releaseLoan(market, loanReleased);
		state = { ...state, loan: state.loan.sub(loanReleased) };

		const repaid = await transferIfAny(ctx.custodian, {
			from: market.quoteVault,
			to: reserve.lendableVault,
			authority: market.signer,
			amount: debtRepaid,
		});
		if (!repaid.ok) return repaid;

		const settled = repayReserve(reserve, state, ctx, vaultStart.value, debtRepaid);
		nextReserve = settled.reserve;
		state = settled.position;
	}

	const returnedToTrader = proceeds.value.sub(debtRepaid);
	const paidOut = await transferIfAny(ctx.custodian, {
		from: market.quoteVault,
		to: request.destination,
		authority: market.signer,
		amount: returnedToTrader,
	});
	if (!paidOut.ok) return paidOut;

	const receipts = await ctx.custodian.balance(position.receiptAccount);
	if (!receipts.ok) return receipts;
	const status = statusAfterClose(positionDebt(state, ctx.timestamp), receipts.value);

	const next: PositionRecord = { ...position, status, state };
	return ok({
		value: { position: next, proceeds: proceeds.value, debtRepaid, loanReleased, returnedToTrader },
		changes: { reserves: [nextReserve], markets: [nextMarket], positions: [next] },
		event: {
			type: "position_closed",
			timestamp: ctx.timestamp,
			marketId: market.id,
			trader: position.trader,
			proceeds: proceeds.value,
			debtRepaid,
			loanReleased,
			returnedToTrader,
			status,
		},
		fields: { proceeds: proceeds.value, debtRepaid, status },
	});
}

// ── Liquidate ────────────────────────────────────────────────────────

/**
 * Sell every receipt-backed lot at the lowest price, then check solvency.
 * Proceeds above `debt × (1 + margin)` mean the position was healthy and the
 * whole operation fails.
 */
export async function liquidatePosition(
	ctx: OperationContext,
	request: LiquidatePositionRequest,
): OperationResult<LiquidationReceipt> {
	const scope = await loadPositionScope(ctx.store, request.marketId, request.trader);
	if (!scope.ok) return scope;
	const { reserve, market, position } = scope.value;

	const transition = tryTransition(position.status, PositionStatus.Liquidated);
	if (!transition.ok) return transition;

	const currentDebt = positionDebt(position.state, ctx.timestamp);
	const cost = liquidationCost(currentDebt, ctx.governance);

	const sizes = await ctx.venue.lotSizes(market.id);
	if (!sizes.ok) return sizes;
	const receipts = await ctx.custodian.balance(position.receiptAccount);
	if (!receipts.ok) return receipts;
	const lots = wholeBaseLots(receipts.value, sizes.value);
	const totalQuote = nativeQuoteQty(LIQUIDATION_LIMIT_PRICE, lots, sizes.value);
	if (lots === 0n || totalQuote === null) {
		return err(
			new InvalidArgumentError("Position holds no whole base lot to sell", {
				receipts: receipts.value.toString(),
				baseLot: sizes.value.base.toString(),
			}),
		);
	}

	const vaultStart = await ctx.custodian.balance(reserve.lendableVault);
	if (!vaultStart.ok) return vaultStart;

	const burned = await ctx.custodian.burn({
		mint: market.receiptMint,
		from: position.receiptAccount,
		authority: market.signer,
		amount: receipts.value,
	});
	if (!burned.ok) return burned;

	const fill = await trade(ctx, market, {
		side: OrderSide.Ask,
		limitPrice: LIQUIDATION_LIMIT_PRICE,
		maxBaseQty: lots,
		maxNativeQuote: totalQuote,
		allowEmpty: true,
	});
	if (!fill.ok) return fill;

	const output = await ctx.custodian.balance(market.quoteVault);
	if (!output.ok) return output;
	if (output.value.gt(cost)) {
		return err(
			new LiquidateHealthyPositionError("Trying to liquidate a healthy position", {
				output: output.value.toString(),
				liquidationCost: cost.toString(),
			}),
		);
	}

	const payout = liquidationPayout(output.value, currentDebt, ctx.governance);
	const payments = [
		{ to: request.liquidatorVault, amount: payout.reward },
		{ to: reserve.lendableVault, amount: payout.toReserve },
		{ to: request.traderVault, amount: payout.toTrader },
	];
	for (const { to, amount } of payments) {
		const paid = await transferIfAny(ctx.custodian, {
			from: market.quoteVault,
			to,
			authority: market.signer,
			amount,
		});
		if (!paid.ok) return paid;
	}

	const nextMarket = releaseLoan(market, position.state.loan);
	let state: PositionState = { ...position.state, loan: TokenAmount.ZERO };
	let nextReserve = reserve;
	if (!currentDebt.isZero()) {
		const settled = repayReserve(reserve, state, ctx, vaultStart.value, currentDebt);
		nextReserve = settled.reserve;
		state = settled.position;
	}

	const next: PositionRecord = { ...position, status: transition.value, state };
	return ok({
		value: {
			position: next,
			proceeds: output.value,
			reward: payout.reward,
			debtRepaid: payout.toReserve,
			returnedToTrader: payout.toTrader,
		},
		changes: { reserves: [nextReserve], markets: [nextMarket], positions: [next] },
		event: {
			type: "position_liquidated",
			timestamp: ctx.timestamp,
			marketId: market.id,
			trader: position.trader,
			liquidator: request.liquidator,
			proceeds: output.value,
			reward: payout.reward,
			debtRepaid: payout.toReserve,
			returnedToTrader: payout.toTrader,
		},
		fields: { liquidator: request.liquidator, proceeds: output.value, reward: payout.reward },
	});
}

// ── Shared steps ─────────────────────────────────────────────────────

interface TradeParams {
	readonly side: OrderSide;
	readonly limitPrice: bigint;
	readonly maxBaseQty: bigint;
	readonly maxNativeQuote: TokenAmount;
	/** A forced unwind settles even when nothing matched. */
	readonly allowEmpty?: boolean | undefined;
}

/** Submit an IOC order paid from the market's own vault, then settle into both market vaults. */
async function trade(
	ctx: OperationContext,
	market: MarketRecord,
	params: TradeParams,
): Promise<Result<Fill, PoolError>> {
	const fill = await ctx.venue.submitOrder({
		market: market.id,
		side: params.side,
		limitPrice: params.limitPrice,
		maxBaseQty: params.maxBaseQty,
		maxNativeQuoteIncludingFees: params.maxNativeQuote,
		payerVault: params.side === OrderSide.Bid ? market.quoteVault : market.baseVault,
		authority: market.signer,
	});
	if (!fill.ok) return fill;
	if (fill.value.filledBaseQty === 0n && params.allowEmpty !== true) {
		return err(
			new OrderRejectedError("Order did not fill at the limit price", {
				side: params.side,
				limitPrice: params.limitPrice.toString(),
			}),
		);
	}

	const settled = await ctx.venue.settle({
		market: market.id,
		baseVault: market.baseVault,
		quoteVault: market.quoteVault,
		authority: market.signer,
	});
	if (!settled.ok) return settled;
	return fill;
}

function releaseLoan(market: MarketRecord, amount: TokenAmount): MarketRecord {
	return { ...market, state: { ...market.state, totalLoan: market.state.totalLoan.sub(amount) } };
}

interface BorrowAmounts {
	/** Reserve vault balance before the operation moved anything. */
	readonly vaultStart: TokenAmount;
	/** Pool debt projected to the operation timestamp. */
	readonly totalDebt: TokenAmount;
	readonly amount: TokenAmount;
}

/** Accrue the treasury, re-price for the new borrow and book it at the leverage-scaled rate. */
function borrowFromReserve(
	reserve: ReserveRecord,
	position: PositionState,
	ctx: { readonly governance: Governance; readonly timestamp: UnixTimestamp },
	amounts: BorrowAmounts,
	multiplier: Factor,
): DebtChange {
	const { vaultStart, totalDebt, amount } = amounts;
	const accrued = accrueTreasury(reserve, ctx.governance, totalDebt, ctx.timestamp);
	const repriced = refreshBorrowRate(accrued, ctx.governance, {
		liquidity: vaultStart,
		liquidityRemoved: amount,
		totalDebt,
		debtAdded: amount,
	});
	return increaseDebt(repriced, position, ctx.timestamp, totalDebt, amount, multiplier);
}

/** Accrue the treasury, remove `amount` of debt, then re-price for the returned liquidity. */
function repayReserve(
	reserve: ReserveRecord,
	position: PositionState,
	ctx: { readonly governance: Governance; readonly timestamp: UnixTimestamp },
	vaultStart: TokenAmount,
	amount: TokenAmount,
): DebtChange {
	const totalDebt = projectTotalDebt(reserve.debt, ctx.timestamp);
	const accrued = accrueTreasury(reserve, ctx.governance, totalDebt, ctx.timestamp);
	const decreased = decreaseDebt(accrued, position, ctx.timestamp, totalDebt, amount);
	return {
		reserve: refreshBorrowRate(decreased.reserve, ctx.governance, {
			liquidity: vaultStart,
			liquidityAdded: amount,
			totalDebt: projectTotalDebt(decreased.reserve.debt, ctx.timestamp),
		}),
		position: decreased.position,
	};
}
