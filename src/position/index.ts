export {
	type MarketRecord,
	type MarketState,
	type PositionRecord,
	type PositionState,
	EMPTY_POSITION_STATE,
	PositionStatus,
} from "./types.js";
export { type DebtIncrease, debtIncrease, positionDebt } from "./position-debt.js";
export {
	borrowLimit,
	borrowedBaseQty,
	checkLeverage,
	rateMultiplier,
	withinBorrowLimit,
} from "./leverage.js";
export {
	type LiquidationPayout,
	type Repayment,
	liquidationCost,
	liquidationPayout,
	liquidationReward,
	settleRepayment,
} from "./settlement.js";
export { canTransitionTo, isSettleable, statusAfterClose, tryTransition } from "./status.js";
