/**
 * Position status machine — validated transitions.
 *
 * uninitialized → open → (open ⇄ partially_repaid) → closed, with liquidated
 * reachable from open and partially_repaid. A closed or liquidated position
 * can be opened again; its record is reused, never deleted.
 */

import type { TokenAmount } from "../math/fixed-point.js";
import { InvalidArgumentError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { PositionStatus } from "./types.js";

const VALID_TRANSITIONS: ReadonlyMap<PositionStatus, readonly PositionStatus[]> = new Map([
	[PositionStatus.Uninitialized, [PositionStatus.Open]],
	[
		PositionStatus.Open,
		[
			PositionStatus.Open,
			PositionStatus.PartiallyRepaid,
			PositionStatus.Closed,
			PositionStatus.Liquidated,
		],
	],
	[
		PositionStatus.PartiallyRepaid,
		[
			PositionStatus.Open,
			PositionStatus.PartiallyRepaid,
			PositionStatus.Closed,
			PositionStatus.Liquidated,
		],
	],
	[PositionStatus.Closed, [PositionStatus.Open]],
	[PositionStatus.Liquidated, [PositionStatus.Open]],
]);

const SETTLEABLE: ReadonlySet<PositionStatus> = new Set([
	PositionStatus.Open,
	PositionStatus.PartiallyRepaid,
]);

/** Open and partially repaid positions can be closed or liquidated. */
export function isSettleable(status: PositionStatus): boolean {
	return SETTLEABLE.has(status);
}

export function canTransitionTo(from: PositionStatus, to: PositionStatus): boolean {
	const valid = VALID_TRANSITIONS.get(from);
	if (!valid) return false;
	return valid.includes(to);
}

/**
 * Attempts to move a position from one status to another.
 *
 * @example
 * ```ts
 * tryTransition(PositionStatus.Closed, PositionStatus.Liquidated); // err(InvalidArgumentError)
 * ```
 */
export function tryTransition(
	from: PositionStatus,
	to: PositionStatus,
): Result<PositionStatus, InvalidArgumentError> {
	if (canTransitionTo(from, to)) {
		return ok(to);
	}
	return err(new InvalidArgumentError(`Invalid position transition: ${from} → ${to}`, { from, to }));
}

/** Status after a close: fully unwound only when no debt and no receipt tokens remain. */
export function statusAfterClose(remainingDebt: TokenAmount, receiptBalance: TokenAmount): PositionStatus {
	return remainingDebt.isZero() && receiptBalance.isZero()
		? PositionStatus.Closed
		: PositionStatus.PartiallyRepaid;
}
