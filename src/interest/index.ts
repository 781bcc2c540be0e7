export { calculateCompounded } from "./compound.js";
export { type BorrowRateCurve, borrowRate, utilization } from "./borrow-rate.js";
export {
	type RateMetrics,
	SECONDS_PER_YEAR,
	annualPercentage,
	rateMetrics,
	utilizationPercentage,
} from "./apr.js";
