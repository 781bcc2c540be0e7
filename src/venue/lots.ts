import { TokenAmount } from "../math/fixed-point.js";
import { U64_MAX } from "../math/uint.js";
import type { LotSizes } from "./types.js";

function checkedU64(raw: bigint): TokenAmount | null {
	return raw < 0n || raw > U64_MAX ? null : TokenAmount.of(raw);
}

/** Native base units for `lots` base lots; null on u64 overflow. */
export function nativeBaseQty(lots: bigint, sizes: LotSizes): TokenAmount | null {
	return checkedU64(lots * sizes.base);
}

/** Native quote cost of `lots` base lots at `limitPrice`; null on u64 overflow. */
export function nativeQuoteQty(limitPrice: bigint, lots: bigint, sizes: LotSizes): TokenAmount | null {
	const lotPrice = limitPrice * sizes.quote;
	if (lotPrice > U64_MAX) return null;
	return checkedU64(lotPrice * lots);
}

/** Whole base lots held in `amount` native units. */
export function wholeBaseLots(amount: TokenAmount, sizes: LotSizes): bigint {
	return sizes.base === 0n ? 0n : amount.raw / sizes.base;
}
