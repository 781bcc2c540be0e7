/**
 * Governance — read-only parameter snapshot normalized to working scales.
 *
 * Raw values are stored at 1e18 precision. Percentage fields and the maximum
 * liquidation reward are divided down to Factor / TokenAmount; rate-curve
 * fields are taken as-is at Rate / Ray scale. A value that does not fit its
 * working type after normalization is a fatal ConfigError.
 */

import type { BorrowRateCurve } from "../interest/borrow-rate.js";
import { validate } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { Factor, Rate, Ray, TokenAmount } from "../math/fixed-point.js";
import { U64_MAX } from "../math/uint.js";
import { ConfigError } from "../shared/errors.js";
import { tryCatch } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { GOVERNANCE_PRECISION, type GovernanceParams, governanceSchema } from "./schema.js";

/** Divide a 1e18-precision value down to a u64 working value. */
function applyAccuracy(params: GovernanceParams, field: keyof GovernanceParams): bigint {
	const normalized = params[field] / GOVERNANCE_PRECISION;
	if (normalized > U64_MAX) {
		throw new ConfigError(`Governance ${field} overflow`, {
			field,
			raw: params[field].toString(),
		});
	}
	return normalized;
}

function asConfigError(thrown: unknown): ConfigError {
	if (thrown instanceof ConfigError) return thrown;
	const message = thrown instanceof Error ? thrown.message : String(thrown);
	return new ConfigError(`Invalid governance snapshot: ${message}`, { cause: thrown });
}

export class Governance implements BorrowRateCurve {
	readonly poolUtilizationAllowance: Factor;
	readonly baseBorrowRate: Rate;
	readonly excessSlope: Ray;
	readonly optimalSlope: Ray;
	readonly optimalUtilization: Ray;
	readonly treasureFactor: Factor;
	readonly maxLeverageFactor: Factor;
	readonly maxRateMultiplier: Factor;
	readonly liquidationMargin: Factor;
	readonly liquidationReward: Factor;
	readonly maxLiquidationReward: TokenAmount;

	private constructor(private readonly params: GovernanceParams) {
		this.poolUtilizationAllowance = Factor.of(applyAccuracy(params, "poolUtilizationAllowance"));
		this.baseBorrowRate = Rate.of(params.baseBorrowRate);
		this.excessSlope = Ray.of(params.excessSlope);
		this.optimalSlope = Ray.of(params.optimalSlope);
		this.optimalUtilization = Ray.of(params.optimalUtilization);
		this.treasureFactor = Factor.of(applyAccuracy(params, "treasureFactor"));
		this.maxLeverageFactor = Factor.of(applyAccuracy(params, "maxLeverageFactor"));
		this.maxRateMultiplier = Factor.of(applyAccuracy(params, "maxRateMultiplier"));
		this.liquidationMargin = Factor.of(applyAccuracy(params, "liquidationMargin"));
		this.liquidationReward = Factor.of(applyAccuracy(params, "liquidationReward"));
		this.maxLiquidationReward = TokenAmount.of(applyAccuracy(params, "maxLiquidationReward"));
	}

	/** Normalize raw values that already passed schema validation. */
	static fromParams(params: GovernanceParams): Result<Governance, ConfigError> {
		return tryCatch(() => new Governance(params), asConfigError);
	}

	/** Validate an untrusted snapshot (e.g. parsed JSON) and normalize it. */
	static parse(input: unknown): Result<Governance, ValidationError | ConfigError> {
		const validated = validate(governanceSchema, input);
		if (!validated.ok) return validated;
		return Governance.fromParams(validated.value);
	}

	/** Raw values as stored. */
	get raw(): GovernanceParams {
		return this.params;
	}

	toJSON(): Record<keyof GovernanceParams, string> {
		const p = this.params;
		return {
			poolUtilizationAllowance: p.poolUtilizationAllowance.toString(),
			baseBorrowRate: p.baseBorrowRate.toString(),
			excessSlope: p.excessSlope.toString(),
			optimalSlope: p.optimalSlope.toString(),
			optimalUtilization: p.optimalUtilization.toString(),
			treasureFactor: p.treasureFactor.toString(),
			maxLeverageFactor: p.maxLeverageFactor.toString(),
			maxRateMultiplier: p.maxRateMultiplier.toString(),
			liquidationMargin: p.liquidationMargin.toString(),
			liquidationReward: p.liquidationReward.toString(),
			maxLiquidationReward: p.maxLiquidationReward.toString(),
		};
	}
}
