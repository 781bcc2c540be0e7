/**
 * Venue bounded context — the order-execution port.
 *
 * The engine never matches orders itself. It submits immediate-or-cancel
 * orders to a Venue and then settles the matched proceeds into the market's
 * vaults. Quantities are in base lots, prices in quote lots per base lot.
 */

import type { TokenAmount } from "../math/fixed-point.js";
import type { PoolError } from "../shared/errors.js";
import type { AuthorityId, MarketId, VaultId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export const OrderSide = {
	/** Buy base with quote */
	Bid: "bid",
	/** Sell base for quote */
	Ask: "ask",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

/** Native units per lot on each side of a market. */
export interface LotSizes {
	readonly base: bigint;
	readonly quote: bigint;
}

export interface VenueOrder {
	readonly market: MarketId;
	readonly side: OrderSide;
	/** Quote lots per base lot. */
	readonly limitPrice: bigint;
	/** Base lots. */
	readonly maxBaseQty: bigint;
	readonly maxNativeQuoteIncludingFees: TokenAmount;
	/** Quote vault for a bid, base vault for an ask. */
	readonly payerVault: VaultId;
	readonly authority: AuthorityId;
}

/** What an IOC order matched; the unfilled remainder is cancelled. */
export interface Fill {
	/** Base lots. */
	readonly filledBaseQty: bigint;
	readonly filledNativeQuote: TokenAmount;
}

export interface SettleRequest {
	readonly market: MarketId;
	readonly baseVault: VaultId;
	readonly quoteVault: VaultId;
	readonly authority: AuthorityId;
}

/** Abstraction over the matching venue -- implemented in-process by MemoryVenue. */
export interface Venue {
	lotSizes(market: MarketId): Promise<Result<LotSizes, PoolError>>;
	submitOrder(order: VenueOrder): Promise<Result<Fill, PoolError>>;
	/** Sweep everything matched for `authority` into the given vaults. */
	settle(request: SettleRequest): Promise<Result<void, PoolError>>;
}
