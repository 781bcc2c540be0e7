/**
 * Checked unsigned integers backed by bigint.
 *
 * Every value carries an explicit width bound. `checked*` methods return null
 * when the raw integer operation would leave [0, bound] or divide by zero;
 * the plain methods throw ComputationFault instead.
 */

import { ComputationFault } from "../shared/errors.js";

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

/** Throw ComputationFault unless `raw` lies in [0, bound]. */
export function assertInRange(raw: bigint, bound: bigint, label: string): bigint {
	if (raw < 0n || raw > bound) {
		throw new ComputationFault(`${label} out of range`, { raw: raw.toString() });
	}
	return raw;
}

/**
 * Round-half-up multiply-divide: `(a * b + scale / 2) / scale`.
 * The intermediate product must fit in `bound`.
 */
export function mulDivRound(a: bigint, b: bigint, scale: bigint, label: string, bound = U128_MAX): bigint {
	const product = a * b;
	const half = scale / 2n;
	if (product > bound || product + half > bound) {
		throw new ComputationFault(`${label} overflow`, { a: a.toString(), b: b.toString() });
	}
	return (product + half) / scale;
}

/**
 * Round-half-up scaled division: `(a * scale + b / 2) / b`.
 */
export function divRound(a: bigint, b: bigint, scale: bigint, label: string, bound = U128_MAX): bigint {
	if (b === 0n) {
		throw new ComputationFault(`${label} division by zero`, { a: a.toString() });
	}
	const scaled = a * scale;
	const half = b / 2n;
	if (scaled > bound || scaled + half > bound) {
		throw new ComputationFault(`${label} overflow`, { a: a.toString(), b: b.toString() });
	}
	return (scaled + half) / b;
}

/** Immutable unsigned integer with a fixed width and an implicit scale. */
export abstract class FixedUint<T extends FixedUint<T>> {
	readonly raw: bigint;

	protected constructor(raw: bigint) {
		this.raw = raw;
	}

	/** Largest representable raw value. */
	protected abstract bound(): bigint;

	/** Type name used in fault messages. */
	protected abstract label(): string;

	/** Wrap a raw value already known to be in range. */
	protected abstract rebuild(raw: bigint): T;

	// ── Checked arithmetic on raw integers ───────────────────────────

	checkedAdd(other: T): T | null {
		return this.wrapChecked(this.raw + other.raw);
	}

	checkedSub(other: T): T | null {
		return this.wrapChecked(this.raw - other.raw);
	}

	checkedMul(other: T): T | null {
		return this.wrapChecked(this.raw * other.raw);
	}

	checkedDiv(other: T): T | null {
		if (other.raw === 0n) return null;
		return this.rebuild(this.raw / other.raw);
	}

	add(other: T): T {
		return this.expect(this.checkedAdd(other), "add");
	}

	sub(other: T): T {
		return this.expect(this.checkedSub(other), "sub");
	}

	mul(other: T): T {
		return this.expect(this.checkedMul(other), "mul");
	}

	div(other: T): T {
		return this.expect(this.checkedDiv(other), "div");
	}

	// ── Comparison ───────────────────────────────────────────────────

	eq(other: T): boolean {
		return this.raw === other.raw;
	}

	gt(other: T): boolean {
		return this.raw > other.raw;
	}

	gte(other: T): boolean {
		return this.raw >= other.raw;
	}

	lt(other: T): boolean {
		return this.raw < other.raw;
	}

	lte(other: T): boolean {
		return this.raw <= other.raw;
	}

	isZero(): boolean {
		return this.raw === 0n;
	}

	min(other: T): T {
		return this.raw <= other.raw ? this.rebuild(this.raw) : other;
	}

	max(other: T): T {
		return this.raw >= other.raw ? this.rebuild(this.raw) : other;
	}

	// ── Conversion ───────────────────────────────────────────────────

	toString(): string {
		return this.raw.toString();
	}

	toJSON(): string {
		return this.raw.toString();
	}

	// ── Internal ─────────────────────────────────────────────────────

	protected expect(value: T | null, op: string): T {
		if (value === null) {
			throw new ComputationFault(`${this.label()}.${op} overflow`, {
				raw: this.raw.toString(),
			});
		}
		return value;
	}

	private wrapChecked(raw: bigint): T | null {
		if (raw < 0n || raw > this.bound()) return null;
		return this.rebuild(raw);
	}
}
