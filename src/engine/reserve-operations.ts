/**
 * Liquidity-provider operations on a reserve.
 *
 * Each body reads balances first, plans the record update with the pure
 * reserve planners, then moves tokens. Transfers and mints run inside the
 * engine's atomic scope, so an early `err` return undoes them.
 */

import { rateMetrics } from "../interest/apr.js";
import type { TokenAmount } from "../math/fixed-point.js";
import { availableLiquidity, projectTotalDebt } from "../reserve/reserve-accounting.js";
import { planDeposit, planTreasuryCollection, planWithdraw } from "../reserve/liquidity-plan.js";
import type { PoolError } from "../shared/errors.js";
import type { ReserveId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { ok } from "../shared/result.js";
import {
	type OperationContext,
	type OperationResult,
	loadReserve,
	requirePositive,
	transferIfAny,
} from "./context.js";
import type {
	CollectTreasuryRequest,
	DepositReceipt,
	DepositRequest,
	ReserveMetrics,
	WithdrawReceipt,
	WithdrawRequest,
} from "./types.js";

export async function deposit(ctx: OperationContext, request: DepositRequest): OperationResult<DepositReceipt> {
	const positive = requirePositive({ amount: request.amount.raw });
	if (!positive.ok) return positive;

	const reserve = await loadReserve(ctx.store, request.reserveId);
	if (!reserve.ok) return reserve;
	const { lendableVault, redeemableMint, signer } = reserve.value;

	const vaultBalance = await ctx.custodian.balance(lendableVault);
	if (!vaultBalance.ok) return vaultBalance;
	const redeemableSupply = await ctx.custodian.supply(redeemableMint);
	if (!redeemableSupply.ok) return redeemableSupply;

	const plan = planDeposit(
		{
			reserve: reserve.value,
			governance: ctx.governance,
			timestamp: ctx.timestamp,
			vaultBalance: vaultBalance.value,
			redeemableSupply: redeemableSupply.value,
		},
		request.amount,
	);

	const paid = await ctx.custodian.transfer({
		from: request.source,
		to: lendableVault,
		authority: request.investor,
		amount: request.amount,
	});
	if (!paid.ok) return paid;

	const minted = await ctx.custodian.mint({
		mint: redeemableMint,
		to: request.redeemableVault,
		authority: signer,
		amount: plan.mintAmount,
	});
	if (!minted.ok) return minted;

	return ok({
		value: { deposited: request.amount, minted: plan.mintAmount },
		changes: { reserves: [plan.reserve] },
		event: {
			type: "reserve_deposited",
			timestamp: ctx.timestamp,
			reserveId: request.reserveId,
			investor: request.investor,
			amount: request.amount,
			minted: plan.mintAmount,
		},
		fields: { amount: request.amount, minted: plan.mintAmount },
	});
}

/**
 * Redeem LP tokens. Pays at most the idle vault balance; the burn shrinks in
 * proportion when the share is larger.
 */
export async function withdraw(ctx: OperationContext, request: WithdrawRequest): OperationResult<WithdrawReceipt> {
	const positive = requirePositive({ redeemableAmount: request.redeemableAmount.raw });
	if (!positive.ok) return positive;

	const reserve = await loadReserve(ctx.store, request.reserveId);
	if (!reserve.ok) return reserve;
	const { lendableVault, redeemableMint, signer } = reserve.value;

	const vaultBalance = await ctx.custodian.balance(lendableVault);
	if (!vaultBalance.ok) return vaultBalance;
	const redeemableSupply = await ctx.custodian.supply(redeemableMint);
	if (!redeemableSupply.ok) return redeemableSupply;

	const plan = planWithdraw(
		{
			reserve: reserve.value,
			governance: ctx.governance,
			timestamp: ctx.timestamp,
			vaultBalance: vaultBalance.value,
			redeemableSupply: redeemableSupply.value,
		},
		request.redeemableAmount,
	);

	const burned = await ctx.custodian.burn({
		mint: redeemableMint,
		from: request.redeemableVault,
		authority: request.investor,
		amount: plan.burnAmount,
	});
	if (!burned.ok) return burned;

	const paid = await transferIfAny(ctx.custodian, {
		from: lendableVault,
		to: request.destination,
		authority: signer,
		amount: plan.withdrawAmount,
	});
	if (!paid.ok) return paid;

	return ok({
		value: { burned: plan.burnAmount, withdrawn: plan.withdrawAmount },
		changes: { reserves: [plan.reserve] },
		event: {
			type: "reserve_withdrawn",
			timestamp: ctx.timestamp,
			reserveId: request.reserveId,
			investor: request.investor,
			burned: plan.burnAmount,
			withdrawn: plan.withdrawAmount,
		},
		fields: { burned: plan.burnAmount, withdrawn: plan.withdrawAmount },
	});
}

/** Move the accrued treasury share, up to the idle vault balance, to `treasuryVault`. */
export async function collectTreasury(
	ctx: OperationContext,
	request: CollectTreasuryRequest,
): OperationResult<TokenAmount> {
	const reserve = await loadReserve(ctx.store, request.reserveId);
	if (!reserve.ok) return reserve;

	const vaultBalance = await ctx.custodian.balance(reserve.value.lendableVault);
	if (!vaultBalance.ok) return vaultBalance;

	const plan = planTreasuryCollection({
		reserve: reserve.value,
		governance: ctx.governance,
		timestamp: ctx.timestamp,
		vaultBalance: vaultBalance.value,
	});

	const paid = await transferIfAny(ctx.custodian, {
		from: reserve.value.lendableVault,
		to: request.treasuryVault,
		authority: reserve.value.signer,
		amount: plan.amount,
	});
	if (!paid.ok) return paid;

	return ok({
		value: plan.amount,
		changes: { reserves: [plan.reserve] },
		event: {
			type: "treasury_collected",
			timestamp: ctx.timestamp,
			reserveId: request.reserveId,
			treasuryVault: request.treasuryVault,
			amount: plan.amount,
		},
		fields: { amount: plan.amount },
	});
}

/** Read-only snapshot of a reserve, with debt projected to the context timestamp. */
export async function reserveMetrics(
	ctx: OperationContext,
	reserveId: ReserveId,
): Promise<Result<ReserveMetrics, PoolError>> {
	const reserve = await loadReserve(ctx.store, reserveId);
	if (!reserve.ok) return reserve;
	const { state, debt } = reserve.value;

	const vaultBalance = await ctx.custodian.balance(reserve.value.lendableVault);
	if (!vaultBalance.ok) return vaultBalance;
	const redeemableSupply = await ctx.custodian.supply(reserve.value.redeemableMint);
	if (!redeemableSupply.ok) return redeemableSupply;

	const totalDebt = projectTotalDebt(debt, ctx.timestamp);
	return ok({
		reserveId,
		timestamp: ctx.timestamp,
		totalDebt,
		vaultBalance: vaultBalance.value,
		totalLiquidity: availableLiquidity(reserve.value, totalDebt, vaultBalance.value),
		treasureAccrued: state.treasureAccrued,
		redeemableSupply: redeemableSupply.value,
		borrowRate: state.borrowRate,
		averageRate: debt.averageRate,
		...rateMetrics({
			debt: totalDebt,
			liquidity: vaultBalance.value,
			borrowRate: state.borrowRate,
			averageRate: debt.averageRate,
		}),
	});
}
