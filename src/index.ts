// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type ReserveId,
	type MarketId,
	type TraderId,
	type VaultId,
	type MintId,
	type AuthorityId,
	reserveId,
	marketId,
	traderId,
	vaultId,
	mintId,
	authorityId,
	traderAuthority,
	positionKey,
	type Result,
	ok,
	err,
	unwrap,
	tryCatch,
	tryCatchAsync,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	unixSeconds,
	type EngineConfig,
	type EngineLogLevel,
	DEFAULT_ENGINE_CONFIG,
	LOG_LEVELS,
	configFromEnv,
	resolveConfig,
	ErrorCategory,
	PoolError,
	InvalidArgumentError,
	InvalidLeverageError,
	BorrowLimitExceededError,
	LiquidateHealthyPositionError,
	RecordNotFoundError,
	RecordExistsError,
	InsufficientBalanceError,
	UnauthorizedError,
	OrderRejectedError,
	ComputationFault,
	ConfigError,
	classifyError,
	isFatal,
	isComputationFault,
	isInvalidLeverage,
	isBorrowLimitExceeded,
	isLiquidateHealthyPosition,
	isInsufficientBalance,
	isConfigError,
} from "./shared/index.js";

// ── Fixed-point math ────────────────────────────────────────────────
export {
	U64_MAX,
	U128_MAX,
	TokenAmount,
	Factor,
	Wad,
	Ray,
	Rate,
	UnixTimestamp,
	mintAmount,
	calculateShare,
} from "./math/index.js";

// ── Interest ────────────────────────────────────────────────────────
export {
	calculateCompounded,
	type BorrowRateCurve,
	borrowRate,
	utilization,
	type RateMetrics,
	SECONDS_PER_YEAR,
	annualPercentage,
	rateMetrics,
	utilizationPercentage,
} from "./interest/index.js";

// ── Governance ──────────────────────────────────────────────────────
export {
	Governance,
	GOVERNANCE_PRECISION,
	type GovernanceParams,
	governanceSchema,
	loadGovernanceFile,
} from "./governance/index.js";

// ── Reserve ─────────────────────────────────────────────────────────
export type { ReserveDebt, ReserveRecord, ReserveState } from "./reserve/index.js";
export {
	accrueTreasury,
	availableLiquidity,
	decreaseDebt,
	increaseDebt,
	projectTotalDebt,
	refreshBorrowRate,
	planDeposit,
	planTreasuryCollection,
	planWithdraw,
} from "./reserve/index.js";

// ── Position ────────────────────────────────────────────────────────
export type { MarketRecord, MarketState, PositionRecord, PositionState } from "./position/index.js";
export {
	EMPTY_POSITION_STATE,
	PositionStatus,
	positionDebt,
	debtIncrease,
	borrowLimit,
	borrowedBaseQty,
	checkLeverage,
	rateMultiplier,
	withinBorrowLimit,
	liquidationCost,
	liquidationPayout,
	liquidationReward,
	settleRepayment,
	canTransitionTo,
	isSettleable,
	statusAfterClose,
	tryTransition,
} from "./position/index.js";

// ── Ports ───────────────────────────────────────────────────────────
export type { AtomicHost, BurnRequest, Custodian, MintRequest, TransferRequest } from "./custody/index.js";
export type { Fill, LotSizes, SettleRequest, Venue, VenueOrder } from "./venue/index.js";
export { OrderSide, nativeBaseQty, nativeQuoteQty, wholeBaseLots } from "./venue/index.js";

// ── Persistence ─────────────────────────────────────────────────────
export { MemoryRecordStore } from "./persistence/index.js";
export type { RecordChanges, RecordStore } from "./persistence/index.js";

// ── Engine ──────────────────────────────────────────────────────────
export { LeverageEngine, createEngine, engineLogger } from "./engine/index.js";
export type {
	EngineHost,
	EngineEvent,
	EngineEvents,
	PositionClosed,
	PositionLiquidated,
	PositionOpened,
	ReserveDeposited,
	ReserveWithdrawn,
	TreasuryCollected,
	ClosePositionReceipt,
	ClosePositionRequest,
	CollectTreasuryRequest,
	DepositReceipt,
	DepositRequest,
	InitializeMarketRequest,
	InitializePositionRequest,
	InitializeReserveRequest,
	LeverageEngineDeps,
	LiquidatePositionRequest,
	LiquidationReceipt,
	OpenPositionReceipt,
	OpenPositionRequest,
	ReserveMetrics,
	WithdrawReceipt,
	WithdrawRequest,
} from "./engine/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";

// ── Lib: Decimal ────────────────────────────────────────────────────
export { LibDecimal } from "./lib/decimal/index.js";
