export type { ReserveDebt, ReserveRecord, ReserveState } from "./types.js";
export {
	type BorrowRateInputs,
	type DebtChange,
	accrueTreasury,
	availableLiquidity,
	decreaseDebt,
	increaseDebt,
	projectTotalDebt,
	refreshBorrowRate,
} from "./reserve-accounting.js";
export {
	type DepositPlan,
	type PoolSnapshot,
	type TreasuryCollectionPlan,
	type WithdrawPlan,
	planDeposit,
	planTreasuryCollection,
	planWithdraw,
} from "./liquidity-plan.js";
