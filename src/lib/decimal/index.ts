/**
 * LibDecimal — decimal.js-light for rendering fixed-point integers as
 * percentage strings. Accounting never goes through this type.
 */
import DecimalLight from "decimal.js-light";

/** Private constructor: u128 values need 39 significant digits. */
const ReportDecimal = DecimalLight.clone({ precision: 48, rounding: DecimalLight.ROUND_HALF_UP });

export class LibDecimal {
	private constructor(private readonly value: DecimalLight) {}

	static from(value: number | bigint): LibDecimal {
		if (typeof value === "number" && !Number.isSafeInteger(value)) {
			throw new RangeError(`LibDecimal.from: ${value} is not a safe integer`);
		}
		return new LibDecimal(new ReportDecimal(value.toString()));
	}

	/**
	 * A raw fixed-point integer divided by its scale.
	 * @example LibDecimal.fromScaled(1_500_000_000n, 1_000_000_000n).toFixed(1) // "1.5"
	 */
	static fromScaled(raw: bigint, scale: bigint): LibDecimal {
		if (scale <= 0n) {
			throw new RangeError(`LibDecimal.fromScaled: invalid scale ${scale}`);
		}
		return new LibDecimal(new ReportDecimal(raw.toString()).dividedBy(scale.toString()));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.value.times(other.value));
	}

	/** Rounds half up. */
	toFixed(places: number): string {
		return this.value.toFixed(places);
	}
}
