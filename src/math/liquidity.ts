/**
 * Liquidity share math for the redeemable (LP) token of a reserve.
 */

import { TokenAmount, Wad } from "./fixed-point.js";

/**
 * Redeemable tokens minted for a deposit of `amount`.
 * The exchange index is supply / liquidity, or 1.0 for an empty pool.
 */
export function mintAmount(
	amount: TokenAmount,
	totalSupply: TokenAmount,
	totalLiquidity: TokenAmount,
): TokenAmount {
	const index =
		totalSupply.isZero() || totalLiquidity.isZero()
			? Wad.ONE
			: totalSupply.intoWad().wadDiv(totalLiquidity.intoWad());
	return amount.intoWad().wadMul(index).asTokenAmount();
}

/**
 * `part / total` of `totalLiquidity`, rounded half up at each step.
 * Zero when `total` is zero.
 */
export function calculateShare(
	part: TokenAmount,
	total: TokenAmount,
	totalLiquidity: TokenAmount,
): TokenAmount {
	const share = total.isZero() ? Wad.of(0n) : part.intoWad().wadDiv(total.intoWad());
	return share.wadMul(totalLiquidity.intoWad()).asTokenAmount();
}
