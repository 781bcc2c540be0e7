import { calculateCompounded } from "../interest/compound.js";
import { TokenAmount } from "../math/fixed-point.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import type { PositionState } from "./types.js";

/** Position debt projected to `timestamp` at its locked rate. */
export function positionDebt(state: PositionState, timestamp: UnixTimestamp): TokenAmount {
	return state.amount
		.intoRay()
		.rayMul(calculateCompounded(state.rate, state.timestamp, timestamp))
		.asTokenAmount();
}

export interface DebtIncrease {
	/** Projected debt at the timestamp. */
	readonly current: TokenAmount;
	/** Interest accrued since the last update. */
	readonly increase: TokenAmount;
}

/** Projected debt and the interest accrued since the position last changed. */
export function debtIncrease(state: PositionState, timestamp: UnixTimestamp): DebtIncrease {
	if (state.amount.isZero()) {
		return { current: TokenAmount.ZERO, increase: TokenAmount.ZERO };
	}
	const current = positionDebt(state, timestamp);
	return { current, increase: current.sub(state.amount) };
}
