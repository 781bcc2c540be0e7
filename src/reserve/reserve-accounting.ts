/**
 * Reserve accounting — pure functions over ReserveRecord (and PositionState
 * where a debt change touches both).
 *
 * Nothing here performs I/O. Every function returns new records; callers
 * commit them only when the surrounding operation succeeds.
 */

import type { Governance } from "../governance/governance.js";
import { borrowRate } from "../interest/borrow-rate.js";
import { calculateCompounded } from "../interest/compound.js";
import { type Factor, Rate, TokenAmount } from "../math/fixed-point.js";
import { UnixTimestamp } from "../math/timestamp.js";
import { debtIncrease } from "../position/position-debt.js";
import type { PositionState } from "../position/types.js";
import { ComputationFault } from "../shared/errors.js";
import type { ReserveDebt, ReserveRecord } from "./types.js";

/** Result of a debt change that updates both the reserve and one position. */
export interface DebtChange {
	readonly reserve: ReserveRecord;
	readonly position: PositionState;
}

// ── Projection ───────────────────────────────────────────────────────

/** Pool debt compounded at the average rate from the last update to `timestamp`. */
export function projectTotalDebt(debt: ReserveDebt, timestamp: UnixTimestamp): TokenAmount {
	return debt.total
		.intoRay()
		.rayMul(calculateCompounded(debt.averageRate, debt.lastUpdate, timestamp))
		.asTokenAmount();
}

// ── Treasury ─────────────────────────────────────────────────────────

/**
 * Add the treasury's cut of interest accrued since the last checkpoint and
 * advance the checkpoint to `timestamp`.
 */
export function accrueTreasury(
	reserve: ReserveRecord,
	governance: Governance,
	currentDebt: TokenAmount,
	timestamp: UnixTimestamp,
): ReserveRecord {
	let fee = TokenAmount.ZERO;
	if (!currentDebt.isZero()) {
		const previousDebt = projectTotalDebt(reserve.debt, reserve.state.treasurerUpdate);
		const accrued = currentDebt.checkedSub(previousDebt);
		if (accrued === null) {
			throw new ComputationFault("Invalid debt: projected debt decreased", {
				currentDebt: currentDebt.toString(),
				previousDebt: previousDebt.toString(),
			});
		}
		fee = governance.treasureFactor.applyTo(accrued);
	}

	return {
		...reserve,
		state: {
			...reserve.state,
			treasureAccrued: reserve.state.treasureAccrued.add(fee),
			treasurerUpdate: timestamp,
		},
	};
}

// ── Liquidity and rate ───────────────────────────────────────────────

/** `totalDebt + vaultBalance − treasureAccrued`; negative is a fault. */
export function availableLiquidity(
	reserve: ReserveRecord,
	totalDebt: TokenAmount,
	vaultBalance: TokenAmount,
): TokenAmount {
	const gross = totalDebt.add(vaultBalance);
	const net = gross.checkedSub(reserve.state.treasureAccrued);
	if (net === null) {
		throw new ComputationFault("Total liquidity underflow", {
			totalDebt: totalDebt.toString(),
			vaultBalance: vaultBalance.toString(),
			treasureAccrued: reserve.state.treasureAccrued.toString(),
		});
	}
	return net;
}

export interface BorrowRateInputs {
	/** Idle vault balance before the operation's transfers. */
	readonly liquidity: TokenAmount;
	readonly liquidityAdded?: TokenAmount | undefined;
	readonly liquidityRemoved?: TokenAmount | undefined;
	readonly totalDebt: TokenAmount;
	readonly debtAdded?: TokenAmount | undefined;
	readonly debtRemoved?: TokenAmount | undefined;
}

/** Re-price the borrow rate for post-operation debt and liquidity. */
export function refreshBorrowRate(
	reserve: ReserveRecord,
	governance: Governance,
	inputs: BorrowRateInputs,
): ReserveRecord {
	const debt = inputs.totalDebt
		.add(inputs.debtAdded ?? TokenAmount.ZERO)
		.sub(inputs.debtRemoved ?? TokenAmount.ZERO);
	const liquidity = inputs.liquidity
		.add(inputs.liquidityAdded ?? TokenAmount.ZERO)
		.sub(inputs.liquidityRemoved ?? TokenAmount.ZERO);

	return {
		...reserve,
		state: { ...reserve.state, borrowRate: borrowRate(debt, liquidity, governance) },
	};
}

// ── Debt changes ─────────────────────────────────────────────────────

/**
 * Register a new borrow of `amount` at `rateMultiplier × borrowRate`.
 *
 * The position's locked rate and the pool's average rate both become the
 * principal-weighted blend of the old and new rate.
 */
export function increaseDebt(
	reserve: ReserveRecord,
	position: PositionState,
	timestamp: UnixTimestamp,
	previousTotal: TokenAmount,
	amount: TokenAmount,
	rateMultiplier: Factor,
): DebtChange {
	const rate = reserve.state.borrowRate.scaleBy(rateMultiplier);
	const amountRayRate = amount.intoWad().intoRay().rayMul(rate.intoRay());

	const { current, increase } = debtIncrease(position, timestamp);
	const nextTotal = previousTotal.add(amount);

	const positionRate = position.rate
		.intoRay()
		.rayMul(current.intoWad().intoRay())
		.add(amountRayRate)
		.rayDiv(current.add(amount).intoWad().intoRay())
		.asRate();

	const averageRate = reserve.debt.averageRate
		.intoRay()
		.rayMul(previousTotal.intoWad().intoRay())
		.add(amountRayRate)
		.rayDiv(nextTotal.intoWad().intoRay())
		.asRate();

	return {
		reserve: {
			...reserve,
			debt: { averageRate, total: nextTotal, lastUpdate: timestamp },
		},
		position: {
			...position,
			amount: position.amount.add(amount).add(increase),
			rate: positionRate,
			timestamp,
		},
	};
}

/**
 * Remove `amount` of debt repaid by one position.
 *
 * Positions and the pool compound independently, so the last borrower can
 * owe slightly more than the pool total. When the repayment covers the pool
 * total, or the position's rate contribution reaches the pool's, the pool
 * debt and average rate reset to zero.
 */
export function decreaseDebt(
	reserve: ReserveRecord,
	position: PositionState,
	timestamp: UnixTimestamp,
	poolTotal: TokenAmount,
	amount: TokenAmount,
): DebtChange {
	const { current, increase } = debtIncrease(position, timestamp);

	let debt: ReserveDebt;
	if (poolTotal.lte(amount)) {
		debt = { averageRate: Rate.ZERO, total: TokenAmount.ZERO, lastUpdate: timestamp };
	} else {
		const nextTotal = poolTotal.sub(amount);
		const poolTerm = reserve.debt.averageRate.intoRay().rayMul(poolTotal.intoWad().intoRay());
		const positionTerm = position.rate.intoRay().rayMul(amount.intoWad().intoRay());

		debt = positionTerm.gte(poolTerm)
			? { averageRate: Rate.ZERO, total: TokenAmount.ZERO, lastUpdate: timestamp }
			: {
					averageRate: poolTerm.sub(positionTerm).rayDiv(nextTotal.intoWad().intoRay()).asRate(),
					total: nextTotal,
					lastUpdate: timestamp,
				};
	}

	const nextPosition: PositionState = amount.eq(current)
		? { ...position, rate: Rate.ZERO, amount: TokenAmount.ZERO, timestamp: UnixTimestamp.ZERO }
		: { ...position, amount: position.amount.add(increase).sub(amount), timestamp };

	return { reserve: { ...reserve, debt }, position: nextPosition };
}
