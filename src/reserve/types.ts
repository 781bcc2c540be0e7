import type { Rate, TokenAmount } from "../math/fixed-point.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import type { AuthorityId, MintId, ReserveId, VaultId } from "../shared/identifiers.js";

export interface ReserveState {
	/** Current per-second borrow rate from the utilization curve. */
	readonly borrowRate: Rate;
	/** Interest owed to the treasury and not yet collected. */
	readonly treasureAccrued: TokenAmount;
	/** Last treasury accrual checkpoint. */
	readonly treasurerUpdate: UnixTimestamp;
}

export interface ReserveDebt {
	/** Debt-weighted average of all open positions' locked rates. */
	readonly averageRate: Rate;
	/** Outstanding principal plus interest as of `lastUpdate`. */
	readonly total: TokenAmount;
	readonly lastUpdate: UnixTimestamp;
}

/** Shared liquidity pool of one lendable asset. */
export interface ReserveRecord {
	readonly id: ReserveId;
	/** Owns the lendable vault and is mint authority of the redeemable mint. */
	readonly signer: AuthorityId;
	readonly lendableMint: MintId;
	readonly lendableVault: VaultId;
	/** LP token minted to depositors. */
	readonly redeemableMint: MintId;
	readonly state: ReserveState;
	readonly debt: ReserveDebt;
}
