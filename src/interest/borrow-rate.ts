/**
 * Two-slope (kinked) borrow rate curve.
 *
 * Below the optimal utilization the rate climbs along `optimalSlope`; above it
 * the remaining headroom is priced along the much steeper `excessSlope`.
 */

import { Ray } from "../math/fixed-point.js";
import type { Rate, TokenAmount } from "../math/fixed-point.js";

/** Inputs of the curve, already normalized by Governance. */
export interface BorrowRateCurve {
	readonly baseBorrowRate: Rate;
	readonly excessSlope: Ray;
	readonly optimalSlope: Ray;
	readonly optimalUtilization: Ray;
}

/**
 * `debt / (liquidity + debt)` in Ray. An empty pool (both zero) is 0% utilized.
 */
export function utilization(debt: TokenAmount, liquidity: TokenAmount): Ray {
	const total = liquidity.intoRay().add(debt.intoRay());
	if (total.isZero()) return Ray.ZERO;
	return debt.intoRay().rayDiv(total);
}

/**
 * Per-second borrow rate for the given debt and idle liquidity.
 * Continuous at the kink: both branches give `base + optimalSlope` there.
 */
export function borrowRate(
	debt: TokenAmount,
	liquidity: TokenAmount,
	curve: BorrowRateCurve,
): Rate {
	const util = utilization(debt, liquidity);
	const base = curve.baseBorrowRate.intoRay();
	const diff = util.checkedSub(curve.optimalUtilization);

	if (diff !== null && !diff.isZero()) {
		const excessRatio = diff.rayDiv(curve.optimalUtilization.invert());
		return base
			.add(curve.optimalSlope)
			.add(curve.excessSlope.rayMul(excessRatio))
			.asRate();
	}

	return base
		.add(curve.optimalSlope.rayMul(util.rayDiv(curve.optimalUtilization)))
		.asRate();
}
