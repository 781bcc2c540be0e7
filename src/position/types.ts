/**
 * Market and position records.
 */

import { Rate, TokenAmount } from "../math/fixed-point.js";
import { UnixTimestamp } from "../math/timestamp.js";
import type { AuthorityId, MarketId, MintId, ReserveId, TraderId, VaultId } from "../shared/identifiers.js";

export interface MarketState {
	/** Quote-asset principal currently borrowed by all positions of this market. */
	readonly totalLoan: TokenAmount;
}

/** One leveraged market per (reserve, base asset) pair. */
export interface MarketRecord {
	readonly id: MarketId;
	readonly reserveId: ReserveId;
	/** Owns the market vaults and the receipt mint. */
	readonly signer: AuthorityId;
	readonly baseMint: MintId;
	readonly baseVault: VaultId;
	/** Must equal the reserve's lendable mint. */
	readonly quoteMint: MintId;
	readonly quoteVault: VaultId;
	readonly receiptMint: MintId;
	readonly state: MarketState;
}

export interface PositionState {
	/** Borrowed principal still attributed to this position. */
	readonly loan: TokenAmount;
	/** Rate locked in at the last debt change. */
	readonly rate: Rate;
	/** Debt (principal plus accrued interest) as of `timestamp`. */
	readonly amount: TokenAmount;
	readonly timestamp: UnixTimestamp;
}

export interface PositionRecord {
	readonly marketId: MarketId;
	readonly trader: TraderId;
	/** Receipt-token account, owned by the market signer. */
	readonly receiptAccount: VaultId;
	readonly status: PositionStatus;
	readonly state: PositionState;
}

/**
 * uninitialized -> open -> (open <-> partially_repaid) -> closed,
 * with liquidated reachable from open and partially_repaid.
 */
export const PositionStatus = {
	Uninitialized: "uninitialized",
	Open: "open",
	PartiallyRepaid: "partially_repaid",
	Closed: "closed",
	Liquidated: "liquidated",
} as const;

export type PositionStatus = (typeof PositionStatus)[keyof typeof PositionStatus];

export const EMPTY_POSITION_STATE: PositionState = {
	loan: TokenAmount.ZERO,
	rate: Rate.ZERO,
	amount: TokenAmount.ZERO,
	timestamp: UnixTimestamp.ZERO,
};
