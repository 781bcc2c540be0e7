/**
 * Leverage helpers for opening a position.
 */

import type { Governance } from "../governance/governance.js";
import { Factor, type TokenAmount } from "../math/fixed-point.js";
import { InvalidLeverageError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

/** Accept leverage in [1x, governance maximum]. */
export function checkLeverage(
	leverage: Factor,
	governance: Governance,
): Result<Factor, InvalidLeverageError> {
	if (leverage.lt(Factor.ONE) || leverage.gt(governance.maxLeverageFactor)) {
		return err(
			new InvalidLeverageError("Invalid leverage factor", {
				leverage: leverage.toString(),
				maxLeverage: governance.maxLeverageFactor.toString(),
			}),
		);
	}
	return ok(leverage);
}

/** Base quantity funded by the reserve: `(leverage − 1) × qty`, in lots. */
export function borrowedBaseQty(leverage: Factor, baseQty: bigint): bigint {
	return leverage.sub(Factor.ONE).percentageMul(baseQty);
}

/**
 * Linear from 1x at leverage 1x to `maxRateMultiplier` at the maximum
 * leverage. Integer division on raw basis points.
 */
export function rateMultiplier(leverage: Factor, governance: Governance): Factor {
	const span = governance.maxLeverageFactor.sub(Factor.ONE);
	const headroom = governance.maxRateMultiplier.sub(Factor.ONE);
	return leverage.sub(Factor.ONE).mul(headroom).div(span).add(Factor.ONE);
}

/** Largest total market loan allowed, exclusive. */
export function borrowLimit(governance: Governance, totalLiquidity: TokenAmount): TokenAmount {
	return governance.poolUtilizationAllowance.applyTo(totalLiquidity);
}

/** `totalLoan < allowance × totalLiquidity`. */
export function withinBorrowLimit(
	totalLoan: TokenAmount,
	governance: Governance,
	totalLiquidity: TokenAmount,
): boolean {
	return totalLoan.lt(borrowLimit(governance, totalLiquidity));
}
