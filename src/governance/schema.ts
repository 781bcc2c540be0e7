import { z } from "../lib/validation/index.js";
import { U128_MAX } from "../math/uint.js";

/** 1e18: every raw governance value is stored at this precision. */
export const GOVERNANCE_PRECISION = 1_000_000_000_000_000_000n;

/** Non-negative u128 given as a decimal string, a safe integer or a bigint. */
const u128 = z
	.union([
		z.string().regex(/^\d+$/, "expected an unsigned decimal integer"),
		z.number().int().nonnegative(),
		z.bigint().nonnegative(),
	])
	.transform((v) => BigInt(v))
	.refine((v) => v <= U128_MAX, "exceeds u128");

/**
 * Raw governance snapshot as stored by the admin layer.
 *
 * Keys follow the stored layout (snake_case); the parsed output is camelCase.
 */
export const governanceSchema = z
	.object({
		pool_utilization_allowance: u128,
		base_borrow_rate: u128,
		excess_slope: u128,
		optimal_slope: u128,
		optimal_utilization: u128.refine(
			(v) => v > 0n && v <= GOVERNANCE_PRECISION,
			"optimal_utilization must be in (0, 1e18]",
		),
		treasure_factor: u128,
		max_leverage_factor: u128,
		max_rate_multiplier: u128,
		liquidation_margin: u128,
		liquidation_reward: u128,
		max_liquidation_reward: u128,
	})
	.strict()
	.transform((raw) => ({
		poolUtilizationAllowance: raw.pool_utilization_allowance,
		baseBorrowRate: raw.base_borrow_rate,
		excessSlope: raw.excess_slope,
		optimalSlope: raw.optimal_slope,
		optimalUtilization: raw.optimal_utilization,
		treasureFactor: raw.treasure_factor,
		maxLeverageFactor: raw.max_leverage_factor,
		maxRateMultiplier: raw.max_rate_multiplier,
		liquidationMargin: raw.liquidation_margin,
		liquidationReward: raw.liquidation_reward,
		maxLiquidationReward: raw.max_liquidation_reward,
	}));

/** Raw (un-normalized) governance values, all at u128 precision. */
export type GovernanceParams = z.output<typeof governanceSchema>;
