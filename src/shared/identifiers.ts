/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing a VaultId where a MintId is expected).
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Identifier of a reserve (one per lendable asset). */
export type ReserveId = Brand<string, "ReserveId">;
/** Identifier of a leveraged market bound to one reserve. */
export type MarketId = Brand<string, "MarketId">;
/** Identifier of a trader; also the trader's signing authority. */
export type TraderId = Brand<string, "TraderId">;
/** Token account holding a balance of a single mint. */
export type VaultId = Brand<string, "VaultId">;
/** Token mint (asset, redeemable LP token or receipt token). */
export type MintId = Brand<string, "MintId">;
/** Signer allowed to move funds out of vaults it owns or mint tokens it controls. */
export type AuthorityId = Brand<string, "AuthorityId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated ReserveId from a raw string. Throws if empty. */
export function reserveId(value: string): ReserveId {
	return createBrandedId(value, "ReserveId");
}

/** Create a validated MarketId from a raw string. Throws if empty. */
export function marketId(value: string): MarketId {
	return createBrandedId(value, "MarketId");
}

/** Create a validated TraderId from a raw string. Throws if empty. */
export function traderId(value: string): TraderId {
	return createBrandedId(value, "TraderId");
}

/** Create a validated VaultId from a raw string. Throws if empty. */
export function vaultId(value: string): VaultId {
	return createBrandedId(value, "VaultId");
}

/** Create a validated MintId from a raw string. Throws if empty. */
export function mintId(value: string): MintId {
	return createBrandedId(value, "MintId");
}

/** Create a validated AuthorityId from a raw string. Throws if empty. */
export function authorityId(value: string): AuthorityId {
	return createBrandedId(value, "AuthorityId");
}

/** A trader signs for their own vaults. */
export function traderAuthority(trader: TraderId): AuthorityId {
	return authorityId(trader);
}

/** Composite key of a position record: one per (market, trader) pair. */
export function positionKey(market: MarketId, trader: TraderId): string {
	return `${market}/${trader}`;
}
