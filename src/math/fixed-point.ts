/**
 * Fixed-point value types used by the accounting core.
 *
 * | Type        | Width | Scale            |
 * |-------------|-------|------------------|
 * | TokenAmount | u64   | 1 (native units) |
 * | Factor      | u64   | 10_000           |
 * | Wad         | u128  | 1e9              |
 * | Ray         | u128  | 1e18             |
 * | Rate        | u128  | 1e27 (Ray × 1e9) |
 *
 * Cross-scale multiplications and divisions round half up. Anything that
 * would leave a type's width throws ComputationFault; nothing wraps.
 */

import { ComputationFault } from "../shared/errors.js";
import { FixedUint, U64_MAX, U128_MAX, assertInRange, divRound, mulDivRound } from "./uint.js";

// ── TokenAmount ─────────────────────────────────────────────────────

/** Native token units (u64). */
export class TokenAmount extends FixedUint<TokenAmount> {
	static readonly ZERO = new TokenAmount(0n);

	private constructor(raw: bigint) {
		super(raw);
	}

	static of(value: bigint | number): TokenAmount {
		return new TokenAmount(assertInRange(BigInt(value), U64_MAX, "TokenAmount"));
	}

	/** Narrow a u128 intermediate result back to a token amount. */
	static fromU128(value: bigint): TokenAmount {
		return new TokenAmount(assertInRange(value, U64_MAX, "TokenAmount.fromU128"));
	}

	protected bound(): bigint {
		return U64_MAX;
	}

	protected label(): string {
		return "TokenAmount";
	}

	protected rebuild(raw: bigint): TokenAmount {
		return new TokenAmount(raw);
	}

	/** Same raw integer at Wad scale (used for share ratios). */
	intoWad(): Wad {
		return Wad.of(this.raw);
	}

	/** Same raw integer at Ray scale (used for rate and interest math). */
	intoRay(): Ray {
		return Ray.of(this.raw);
	}
}

// ── Factor ──────────────────────────────────────────────────────────

/** Percentage with 1 unit = 0.01% (u64, ONE = 10_000). Values above ONE are allowed. */
export class Factor extends FixedUint<Factor> {
	static readonly ONE = new Factor(10_000n);
	static readonly ZERO = new Factor(0n);
	private static readonly HALF = 5_000n;

	private constructor(raw: bigint) {
		super(raw);
	}

	static of(value: bigint | number): Factor {
		return new Factor(assertInRange(BigInt(value), U64_MAX, "Factor"));
	}

	protected bound(): bigint {
		return U64_MAX;
	}

	protected label(): string {
		return "Factor";
	}

	protected rebuild(raw: bigint): Factor {
		return new Factor(raw);
	}

	/** `(value * factor + HALF) / ONE` in u128. */
	percentageMul(value: bigint): bigint {
		const product = value * this.raw;
		if (value < 0n || product + Factor.HALF > U128_MAX) {
			throw new ComputationFault("Factor.percentageMul overflow", {
				value: value.toString(),
				factor: this.raw.toString(),
			});
		}
		return (product + Factor.HALF) / Factor.ONE.raw;
	}

	/** This percentage of a token amount, rounded half up. */
	applyTo(amount: TokenAmount): TokenAmount {
		return TokenAmount.fromU128(this.percentageMul(amount.raw));
	}

	/** `ONE - this`; faults above 100%. */
	invert(): Factor {
		return this.expect(Factor.ONE.checkedSub(this), "invert");
	}
}

// ── Wad ─────────────────────────────────────────────────────────────

/** Ratio at 1e9 precision (u128). */
export class Wad extends FixedUint<Wad> {
	static readonly ONE = new Wad(1_000_000_000n);

	private constructor(raw: bigint) {
		super(raw);
	}

	static of(value: bigint | number): Wad {
		return new Wad(assertInRange(BigInt(value), U128_MAX, "Wad"));
	}

	protected bound(): bigint {
		return U128_MAX;
	}

	protected label(): string {
		return "Wad";
	}

	protected rebuild(raw: bigint): Wad {
		return new Wad(raw);
	}

	// (a * b + HALF_WAD) / WAD
	wadMul(other: Wad): Wad {
		return new Wad(mulDivRound(this.raw, other.raw, Wad.ONE.raw, "Wad.wadMul"));
	}

	// (a * WAD + b / 2) / b
	wadDiv(other: Wad): Wad {
		return new Wad(divRound(this.raw, other.raw, Wad.ONE.raw, "Wad.wadDiv"));
	}

	intoRay(): Ray {
		const scaled = this.raw * 1_000_000_000n;
		if (scaled > U128_MAX) {
			throw new ComputationFault("Wad.intoRay overflow", { raw: this.raw.toString() });
		}
		return Ray.of(scaled);
	}

	asTokenAmount(): TokenAmount {
		return TokenAmount.fromU128(this.raw);
	}
}

// ── Ray ─────────────────────────────────────────────────────────────

/** High-precision ratio at 1e18 (u128). */
export class Ray extends FixedUint<Ray> {
	static readonly ONE = new Ray(1_000_000_000_000_000_000n);
	static readonly ZERO = new Ray(0n);

	private constructor(raw: bigint) {
		super(raw);
	}

	static of(value: bigint | number): Ray {
		return new Ray(assertInRange(BigInt(value), U128_MAX, "Ray"));
	}

	protected bound(): bigint {
		return U128_MAX;
	}

	protected label(): string {
		return "Ray";
	}

	protected rebuild(raw: bigint): Ray {
		return new Ray(raw);
	}

	// (a * b + HALF_RAY) / RAY
	rayMul(other: Ray): Ray {
		return new Ray(mulDivRound(this.raw, other.raw, Ray.ONE.raw, "Ray.rayMul"));
	}

	// (a * RAY + b / 2) / b
	rayDiv(other: Ray): Ray {
		return new Ray(divRound(this.raw, other.raw, Ray.ONE.raw, "Ray.rayDiv"));
	}

	/** `ONE - this`; faults above 1.0. */
	invert(): Ray {
		return this.expect(Ray.ONE.checkedSub(this), "invert");
	}

	asTokenAmount(): TokenAmount {
		return TokenAmount.fromU128(this.raw);
	}

	asRate(): Rate {
		const scaled = this.raw * Rate.RAY_RATIO;
		if (scaled > U128_MAX) {
			throw new ComputationFault("Ray.asRate overflow", { raw: this.raw.toString() });
		}
		return Rate.of(scaled);
	}
}

// ── Rate ────────────────────────────────────────────────────────────

/** Stored per-second rate; one Ray unit equals RAY_RATIO rate units. */
export class Rate extends FixedUint<Rate> {
	static readonly ZERO = new Rate(0n);
	static readonly RAY_RATIO = 1_000_000_000n;

	private constructor(raw: bigint) {
		super(raw);
	}

	static of(value: bigint | number): Rate {
		return new Rate(assertInRange(BigInt(value), U128_MAX, "Rate"));
	}

	protected bound(): bigint {
		return U128_MAX;
	}

	protected label(): string {
		return "Rate";
	}

	protected rebuild(raw: bigint): Rate {
		return new Rate(raw);
	}

	/** Drops the sub-Ray digits (truncating). */
	intoRay(): Ray {
		return Ray.of(this.raw / Rate.RAY_RATIO);
	}

	/** Scale a rate by a percentage (e.g. a leverage-tier multiplier). */
	scaleBy(factor: Factor): Rate {
		return Rate.of(factor.percentageMul(this.raw));
	}
}
