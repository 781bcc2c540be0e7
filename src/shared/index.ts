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
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	unwrap,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
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
} from "./errors.js";

export { type Clock, SystemClock, FakeClock, Duration, unixSeconds } from "./time.js";
export {
	type EngineConfig,
	type EngineLogLevel,
	DEFAULT_ENGINE_CONFIG,
	LOG_LEVELS,
	configFromEnv,
	resolveConfig,
} from "./config.js";
