export { LeverageEngine } from "./leverage-engine.js";
export { type EngineHost, createEngine, engineLogger } from "./bootstrap.js";
export type {
	EngineEvent,
	EngineEvents,
	PositionClosed,
	PositionLiquidated,
	PositionOpened,
	ReserveDeposited,
	ReserveWithdrawn,
	TreasuryCollected,
} from "./events.js";
export type {
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
} from "./types.js";
