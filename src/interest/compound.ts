/**
 * Compounded interest multiplier.
 *
 * (1+x)^n is approximated with the first terms of its binomial expansion:
 * 1 + n·x + n(n-1)/2·x² + n(n-1)(n-2)/6·x³ + ...
 * Cost is fixed regardless of the elapsed time.
 */

import { Ray } from "../math/fixed-point.js";
import type { Rate } from "../math/fixed-point.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import { ComputationFault } from "../shared/errors.js";

/** Terms after the linear one. */
const EXTRA_TERMS = 4n;

/**
 * Growth multiplier (in Ray) for `rate` per second between two timestamps.
 * @throws ComputationFault when `timestamp` precedes `lastTimestamp` or on overflow
 */
export function calculateCompounded(
	rate: Rate,
	lastTimestamp: UnixTimestamp,
	timestamp: UnixTimestamp,
): Ray {
	const rateRay = rate.intoRay();
	let result = Ray.ONE;

	const elapsed = timestamp.checkedSub(lastTimestamp);
	if (elapsed === null) {
		throw new ComputationFault("Invalid timestamps", {
			lastTimestamp: lastTimestamp.toString(),
			timestamp: timestamp.toString(),
		});
	}
	if (elapsed.isZero()) {
		return result;
	}
	const exp = elapsed.raw;

	let term = rateRay.mul(Ray.of(exp));
	result = result.add(term);
	for (let i = 1n; i <= EXTRA_TERMS; i++) {
		if (exp <= i) break;
		// term = rayMul(rate, term * (exp - i)) / (i + 1)
		term = term.mul(Ray.of(exp - i));
		term = rateRay.rayMul(term).div(Ray.of(i + 1n));
		result = result.add(term);
	}
	return result;
}
