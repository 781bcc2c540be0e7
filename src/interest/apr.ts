/**
 * Human-readable rate reporting. Display and logging only; nothing here
 * feeds back into accounting.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import { Ray } from "../math/fixed-point.js";
import type { Rate, TokenAmount } from "../math/fixed-point.js";
import { utilization } from "./borrow-rate.js";

/** 365 days; rates are simple-annualized, not compounded. */
export const SECONDS_PER_YEAR = 31_536_000n;

const RATE_SCALE = Ray.ONE.raw * 1_000_000_000n;
const HUNDRED = LibDecimal.from(100);

/**
 * Per-second rate expressed as an annual percentage string.
 * @example annualPercentage(Rate.of(1_000_000_000_000_000_000n)) // "3.1536" (1e-9/s)
 */
export function annualPercentage(rate: Rate, places = 4): string {
	return LibDecimal.fromScaled(rate.raw, RATE_SCALE)
		.mul(LibDecimal.from(SECONDS_PER_YEAR))
		.mul(HUNDRED)
		.toFixed(places);
}

/** Utilization (`debt / (liquidity + debt)`) as a percentage string. */
export function utilizationPercentage(debt: TokenAmount, liquidity: TokenAmount, places = 2): string {
	return LibDecimal.fromScaled(utilization(debt, liquidity).raw, Ray.ONE.raw)
		.mul(HUNDRED)
		.toFixed(places);
}

export interface RateMetrics {
	readonly utilization: string;
	readonly borrowApr: string;
	readonly averageDebtApr: string;
}

export function rateMetrics(input: {
	debt: TokenAmount;
	liquidity: TokenAmount;
	borrowRate: Rate;
	averageRate: Rate;
}): RateMetrics {
	return {
		utilization: utilizationPercentage(input.debt, input.liquidity),
		borrowApr: annualPercentage(input.borrowRate),
		averageDebtApr: annualPercentage(input.averageRate),
	};
}
