/**
 * Custody bounded context — token transport and the atomic host.
 *
 * Every call checks the signing authority: transfers and burns need the
 * owner of the source vault, mints need the mint authority.
 */

import type { TokenAmount } from "../math/fixed-point.js";
import type { PoolError } from "../shared/errors.js";
import type { AuthorityId, MintId, VaultId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export interface TransferRequest {
	readonly from: VaultId;
	readonly to: VaultId;
	readonly authority: AuthorityId;
	readonly amount: TokenAmount;
}

export interface MintRequest {
	readonly mint: MintId;
	readonly to: VaultId;
	readonly authority: AuthorityId;
	readonly amount: TokenAmount;
}

export interface BurnRequest {
	readonly mint: MintId;
	readonly from: VaultId;
	readonly authority: AuthorityId;
	readonly amount: TokenAmount;
}

export interface Custodian {
	balance(vault: VaultId): Promise<Result<TokenAmount, PoolError>>;
	supply(mint: MintId): Promise<Result<TokenAmount, PoolError>>;
	transfer(request: TransferRequest): Promise<Result<void, PoolError>>;
	mint(request: MintRequest): Promise<Result<void, PoolError>>;
	burn(request: BurnRequest): Promise<Result<void, PoolError>>;
}

/**
 * All-or-nothing execution. Every custody and venue effect made inside `fn`
 * is reverted when it returns `err` or throws; a throw is re-raised.
 */
export interface AtomicHost {
	atomic<T>(fn: () => Promise<Result<T, PoolError>>): Promise<Result<T, PoolError>>;
}
