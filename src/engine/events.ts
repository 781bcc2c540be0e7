/**
 * Engine events — emitted only after an operation has committed.
 *
 * Amounts are fixed-point values in native token units; `timestamp` is the
 * operation's Unix timestamp in seconds.
 */

import type { Factor, Rate, TokenAmount } from "../math/fixed-point.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import type { PositionStatus } from "../position/types.js";
import type { AuthorityId, MarketId, ReserveId, TraderId, VaultId } from "../shared/identifiers.js";

export type EngineEvent =
	| ReserveDeposited
	| ReserveWithdrawn
	| TreasuryCollected
	| PositionOpened
	| PositionClosed
	| PositionLiquidated;

// ── Reserve ──────────────────────────────────────────────────────────

export interface ReserveDeposited {
	readonly type: "reserve_deposited";
	readonly timestamp: UnixTimestamp;
	readonly reserveId: ReserveId;
	readonly investor: AuthorityId;
	readonly amount: TokenAmount;
	/** Redeemable tokens minted. */
	readonly minted: TokenAmount;
}

export interface ReserveWithdrawn {
	readonly type: "reserve_withdrawn";
	readonly timestamp: UnixTimestamp;
	readonly reserveId: ReserveId;
	readonly investor: AuthorityId;
	readonly burned: TokenAmount;
	readonly withdrawn: TokenAmount;
}

export interface TreasuryCollected {
	readonly type: "treasury_collected";
	readonly timestamp: UnixTimestamp;
	readonly reserveId: ReserveId;
	readonly treasuryVault: VaultId;
	readonly amount: TokenAmount;
}

// ── Positions ────────────────────────────────────────────────────────

export interface PositionOpened {
	readonly type: "position_opened";
	readonly timestamp: UnixTimestamp;
	readonly marketId: MarketId;
	readonly trader: TraderId;
	readonly leverage: Factor;
	/** Native base units bought and receipt tokens minted. */
	readonly baseFilled: TokenAmount;
	readonly quoteSpent: TokenAmount;
	/** New debt registered with the reserve. */
	readonly borrowed: TokenAmount;
	readonly rate: Rate;
}

export interface PositionClosed {
	readonly type: "position_closed";
	readonly timestamp: UnixTimestamp;
	readonly marketId: MarketId;
	readonly trader: TraderId;
	readonly proceeds: TokenAmount;
	readonly debtRepaid: TokenAmount;
	readonly loanReleased: TokenAmount;
	readonly returnedToTrader: TokenAmount;
	readonly status: PositionStatus;
}

export interface PositionLiquidated {
	readonly type: "position_liquidated";
	readonly timestamp: UnixTimestamp;
	readonly marketId: MarketId;
	readonly trader: TraderId;
	readonly liquidator: AuthorityId;
	readonly proceeds: TokenAmount;
	readonly reward: TokenAmount;
	readonly debtRepaid: TokenAmount;
	readonly returnedToTrader: TokenAmount;
}

/** Handler map for TypedEmitter. */
export type EngineEvents = {
	reserve_deposited: (event: ReserveDeposited) => void;
	reserve_withdrawn: (event: ReserveWithdrawn) => void;
	treasury_collected: (event: TreasuryCollected) => void;
	position_opened: (event: PositionOpened) => void;
	position_closed: (event: PositionClosed) => void;
	position_liquidated: (event: PositionLiquidated) => void;
};
