/**
 * Engine request, response and dependency types.
 */

import type { AtomicHost, Custodian } from "../custody/types.js";
import type { Governance } from "../governance/governance.js";
import type { RateMetrics } from "../interest/apr.js";
import type { Logger } from "../lib/logger/index.js";
import type { Factor, Rate, TokenAmount } from "../math/fixed-point.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import type { RecordStore } from "../persistence/record-store.js";
import type { PositionRecord } from "../position/types.js";
import type {
	AuthorityId,
	MarketId,
	MintId,
	ReserveId,
	TraderId,
	VaultId,
} from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import type { Venue } from "../venue/types.js";

export interface LeverageEngineDeps {
	readonly store: RecordStore;
	readonly venue: Venue;
	readonly custodian: Custodian;
	readonly host: AtomicHost;
	readonly governance: Governance;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

// ── Record creation ──────────────────────────────────────────────────

export interface InitializeReserveRequest {
	readonly id: ReserveId;
	readonly signer: AuthorityId;
	readonly lendableMint: MintId;
	readonly lendableVault: VaultId;
	readonly redeemableMint: MintId;
}

export interface InitializeMarketRequest {
	readonly id: MarketId;
	readonly reserveId: ReserveId;
	readonly signer: AuthorityId;
	readonly baseMint: MintId;
	readonly baseVault: VaultId;
	readonly quoteMint: MintId;
	readonly quoteVault: VaultId;
	readonly receiptMint: MintId;
}

export interface InitializePositionRequest {
	readonly marketId: MarketId;
	readonly trader: TraderId;
	/** Receipt-token vault owned by the market signer. */
	readonly receiptAccount: VaultId;
}

// ── Liquidity provision ──────────────────────────────────────────────

export interface DepositRequest {
	readonly reserveId: ReserveId;
	readonly investor: AuthorityId;
	/** Investor's lendable-asset vault. */
	readonly source: VaultId;
	/** Investor's vault of the reserve's redeemable mint. */
	readonly redeemableVault: VaultId;
	readonly amount: TokenAmount;
}

export interface DepositReceipt {
	readonly deposited: TokenAmount;
	readonly minted: TokenAmount;
}

export interface WithdrawRequest {
	readonly reserveId: ReserveId;
	readonly investor: AuthorityId;
	readonly redeemableVault: VaultId;
	readonly destination: VaultId;
	readonly redeemableAmount: TokenAmount;
}

export interface WithdrawReceipt {
	readonly burned: TokenAmount;
	readonly withdrawn: TokenAmount;
}

export interface CollectTreasuryRequest {
	readonly reserveId: ReserveId;
	readonly treasuryVault: VaultId;
}

// ── Positions ────────────────────────────────────────────────────────

export interface OpenPositionRequest {
	readonly marketId: MarketId;
	readonly trader: TraderId;
	/** Trader's quote-asset vault paying the trader-funded share. */
	readonly source: VaultId;
	/** Quote lots per base lot. */
	readonly limitPrice: bigint;
	/** Trader-funded base lots; the borrowed share is added on top. */
	readonly baseQty: bigint;
	readonly leverage: Factor;
}

export interface OpenPositionReceipt {
	readonly position: PositionRecord;
	readonly baseFilled: TokenAmount;
	readonly quoteSpent: TokenAmount;
	readonly borrowed: TokenAmount;
}

export interface ClosePositionRequest {
	readonly marketId: MarketId;
	readonly trader: TraderId;
	/** Trader's quote-asset vault receiving what is left after repayment. */
	readonly destination: VaultId;
	readonly limitPrice: bigint;
	/** Base lots to sell. */
	readonly baseQty: bigint;
}

export interface ClosePositionReceipt {
	readonly position: PositionRecord;
	readonly proceeds: TokenAmount;
	readonly debtRepaid: TokenAmount;
	readonly loanReleased: TokenAmount;
	readonly returnedToTrader: TokenAmount;
}

export interface LiquidatePositionRequest {
	readonly marketId: MarketId;
	readonly trader: TraderId;
	readonly liquidator: AuthorityId;
	/** Liquidator's quote-asset vault receiving the reward. */
	readonly liquidatorVault: VaultId;
	/** Trader's quote-asset vault receiving any surplus. */
	readonly traderVault: VaultId;
}

export interface LiquidationReceipt {
	readonly position: PositionRecord;
	readonly proceeds: TokenAmount;
	readonly reward: TokenAmount;
	readonly debtRepaid: TokenAmount;
	readonly returnedToTrader: TokenAmount;
}

// ── Reporting ────────────────────────────────────────────────────────

export interface ReserveMetrics extends RateMetrics {
	readonly reserveId: ReserveId;
	readonly timestamp: UnixTimestamp;
	/** Pool debt projected to `timestamp`. */
	readonly totalDebt: TokenAmount;
	readonly vaultBalance: TokenAmount;
	/** `totalDebt + vaultBalance − treasureAccrued`. */
	readonly totalLiquidity: TokenAmount;
	readonly treasureAccrued: TokenAmount;
	readonly redeemableSupply: TokenAmount;
	readonly borrowRate: Rate;
	readonly averageRate: Rate;
}
