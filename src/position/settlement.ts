/**
 * How sale proceeds are split between the reserve, the liquidator and the
 * trader when a position is closed or liquidated.
 */

import type { Governance } from "../governance/governance.js";
import { TokenAmount } from "../math/fixed-point.js";
import { calculateShare } from "../math/liquidity.js";

export interface Repayment {
	/** Debt repaid to the reserve. */
	readonly debtChange: TokenAmount;
	/** Loan principal released from the position and the market. */
	readonly loanChange: TokenAmount;
}

/**
 * Repay as much of `currentDebt` as `proceeds` cover. A shortfall releases
 * only the matching share of the loan.
 */
export function settleRepayment(
	currentDebt: TokenAmount,
	proceeds: TokenAmount,
	loan: TokenAmount,
): Repayment {
	if (currentDebt.gt(proceeds)) {
		return { debtChange: proceeds, loanChange: calculateShare(proceeds, currentDebt, loan) };
	}
	return { debtChange: currentDebt, loanChange: loan };
}

/** Current debt plus the liquidation margin. */
export function liquidationCost(currentDebt: TokenAmount, governance: Governance): TokenAmount {
	return currentDebt.add(governance.liquidationMargin.applyTo(currentDebt));
}

/** Reward percentage of the proceeds, capped when a nonzero cap is set. */
export function liquidationReward(output: TokenAmount, governance: Governance): TokenAmount {
	const reward = governance.liquidationReward.applyTo(output);
	const cap = governance.maxLiquidationReward;
	return !cap.isZero() && cap.lt(reward) ? cap : reward;
}

export interface LiquidationPayout {
	readonly reward: TokenAmount;
	readonly toReserve: TokenAmount;
	readonly toTrader: TokenAmount;
}

/**
 * Split forced-unwind proceeds: the liquidator's reward first, then the debt,
 * then whatever is left to the trader.
 */
export function liquidationPayout(
	output: TokenAmount,
	currentDebt: TokenAmount,
	governance: Governance,
): LiquidationPayout {
	const reward = liquidationReward(output, governance);
	const left = output.sub(reward);
	const surplus = left.checkedSub(currentDebt);
	if (surplus !== null && !surplus.isZero()) {
		return { reward, toReserve: currentDebt, toTrader: surplus };
	}
	return { reward, toReserve: left, toTrader: TokenAmount.ZERO };
}
