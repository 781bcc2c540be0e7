/**
 * Deposit, withdrawal and treasury-collection planning.
 *
 * Each planner takes the balances read from custody, returns the updated
 * reserve record and the token amounts the engine must then move.
 */

import type { Governance } from "../governance/governance.js";
import type { TokenAmount } from "../math/fixed-point.js";
import { calculateShare, mintAmount } from "../math/liquidity.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import {
	accrueTreasury,
	availableLiquidity,
	projectTotalDebt,
	refreshBorrowRate,
} from "./reserve-accounting.js";
import type { ReserveRecord } from "./types.js";

export interface PoolSnapshot {
	readonly reserve: ReserveRecord;
	readonly governance: Governance;
	readonly timestamp: UnixTimestamp;
	/** Lendable vault balance before any transfer. */
	readonly vaultBalance: TokenAmount;
	/** Redeemable token supply before any mint or burn. */
	readonly redeemableSupply: TokenAmount;
}

export interface DepositPlan {
	readonly reserve: ReserveRecord;
	readonly totalDebt: TokenAmount;
	/** Redeemable tokens to mint to the investor. */
	readonly mintAmount: TokenAmount;
}

export function planDeposit(pool: PoolSnapshot, amount: TokenAmount): DepositPlan {
	const totalDebt = projectTotalDebt(pool.reserve.debt, pool.timestamp);
	let reserve = accrueTreasury(pool.reserve, pool.governance, totalDebt, pool.timestamp);
	reserve = refreshBorrowRate(reserve, pool.governance, {
		liquidity: pool.vaultBalance,
		liquidityAdded: amount,
		totalDebt,
	});

	const totalLiquidity = availableLiquidity(reserve, totalDebt, pool.vaultBalance);
	return {
		reserve,
		totalDebt,
		mintAmount: mintAmount(amount, pool.redeemableSupply, totalLiquidity),
	};
}

export interface WithdrawPlan {
	readonly reserve: ReserveRecord;
	readonly totalDebt: TokenAmount;
	/** Redeemable tokens to burn from the investor. */
	readonly burnAmount: TokenAmount;
	/** Lendable tokens to pay out. */
	readonly withdrawAmount: TokenAmount;
}

/**
 * Redeem `redeemableAmount` for its share of total liquidity. When the share
 * exceeds the idle vault balance, only the vault balance is paid and the burn
 * is scaled down in proportion.
 */
export function planWithdraw(pool: PoolSnapshot, redeemableAmount: TokenAmount): WithdrawPlan {
	const totalDebt = projectTotalDebt(pool.reserve.debt, pool.timestamp);
	const totalLiquidity = availableLiquidity(pool.reserve, totalDebt, pool.vaultBalance);

	let withdrawAmount = calculateShare(redeemableAmount, pool.redeemableSupply, totalLiquidity);
	let burnAmount = redeemableAmount;
	if (withdrawAmount.gt(pool.vaultBalance)) {
		const portion = pool.vaultBalance.intoWad().wadDiv(withdrawAmount.intoWad());
		burnAmount = redeemableAmount.intoWad().wadMul(portion).asTokenAmount();
		withdrawAmount = pool.vaultBalance;
	}

	let reserve = accrueTreasury(pool.reserve, pool.governance, totalDebt, pool.timestamp);
	reserve = refreshBorrowRate(reserve, pool.governance, {
		liquidity: pool.vaultBalance,
		liquidityRemoved: withdrawAmount,
		totalDebt,
	});

	return { reserve, totalDebt, burnAmount, withdrawAmount };
}

export interface TreasuryCollectionPlan {
	readonly reserve: ReserveRecord;
	/** Lendable tokens to move from the reserve vault to the treasury. */
	readonly amount: TokenAmount;
}

/**
 * Accrue the treasury up to now, then collect as much of it as the vault
 * holds. Total liquidity is unchanged: vault and treasure shrink together.
 */
export function planTreasuryCollection(
	pool: Omit<PoolSnapshot, "redeemableSupply">,
): TreasuryCollectionPlan {
	const totalDebt = projectTotalDebt(pool.reserve.debt, pool.timestamp);
	const accrued = accrueTreasury(pool.reserve, pool.governance, totalDebt, pool.timestamp);
	const amount = accrued.state.treasureAccrued.min(pool.vaultBalance);

	const collected: ReserveRecord = {
		...accrued,
		state: { ...accrued.state, treasureAccrued: accrued.state.treasureAccrued.sub(amount) },
	};
	return {
		reserve: refreshBorrowRate(collected, pool.governance, {
			liquidity: pool.vaultBalance,
			liquidityRemoved: amount,
			totalDebt,
		}),
		amount,
	};
}
