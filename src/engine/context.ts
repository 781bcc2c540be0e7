import type { Custodian, TransferRequest } from "../custody/types.js";
import type { Governance } from "../governance/governance.js";
import type { UnixTimestamp } from "../math/timestamp.js";
import type { RecordChanges, RecordStore } from "../persistence/record-store.js";
import type { MarketRecord, PositionRecord } from "../position/types.js";
import type { ReserveRecord } from "../reserve/types.js";
import { InvalidArgumentError, type PoolError, RecordNotFoundError } from "../shared/errors.js";
import type { MarketId, ReserveId, TraderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Venue } from "../venue/types.js";
import type { EngineEvent } from "./events.js";

/** Everything one operation body may touch. `timestamp` is read once per operation. */
export interface OperationContext {
	readonly store: RecordStore;
	readonly venue: Venue;
	readonly custodian: Custodian;
	readonly governance: Governance;
	readonly timestamp: UnixTimestamp;
}

/** What a successful operation body hands back to the engine for commit. */
export interface Outcome<T> {
	readonly value: T;
	readonly changes: RecordChanges;
	readonly event?: EngineEvent | undefined;
	/** Extra fields for the commit log line. */
	readonly fields?: Record<string, unknown> | undefined;
}

export type OperationResult<T> = Promise<Result<Outcome<T>, PoolError>>;

// ── Record loading ───────────────────────────────────────────────────

export async function loadReserve(
	store: RecordStore,
	id: ReserveId,
): Promise<Result<ReserveRecord, RecordNotFoundError>> {
	const reserve = await store.reserve(id);
	if (!reserve) return err(new RecordNotFoundError(`Reserve ${id} not found`, { reserveId: id }));
	return ok(reserve);
}

export interface PositionScope {
	readonly reserve: ReserveRecord;
	readonly market: MarketRecord;
	readonly position: PositionRecord;
}

/** Load a position together with its market and the market's reserve. */
export async function loadPositionScope(
	store: RecordStore,
	marketId: MarketId,
	trader: TraderId,
): Promise<Result<PositionScope, RecordNotFoundError>> {
	const market = await store.market(marketId);
	if (!market) return err(new RecordNotFoundError(`Market ${marketId} not found`, { marketId }));

	const position = await store.position(marketId, trader);
	if (!position) {
		return err(
			new RecordNotFoundError(`Position of ${trader} in ${marketId} not found`, { marketId, trader }),
		);
	}

	const reserve = await loadReserve(store, market.reserveId);
	if (!reserve.ok) return reserve;
	return ok({ reserve: reserve.value, market, position });
}

// ── Argument checks ──────────────────────────────────────────────────

/** Reject zero or negative prices and quantities. */
export function requirePositive(
	values: Record<string, bigint>,
): Result<void, InvalidArgumentError> {
	for (const [name, value] of Object.entries(values)) {
		if (value <= 0n) {
			return err(
				new InvalidArgumentError(`${name} must be positive`, { [name]: value.toString() }),
			);
		}
	}
	return ok(undefined);
}

// ── Custody ──────────────────────────────────────────────────────────

/** Transfer unless the amount is zero. */
export async function transferIfAny(
	custodian: Custodian,
	request: TransferRequest,
): Promise<Result<void, PoolError>> {
	if (request.amount.isZero()) return ok(undefined);
	return custodian.transfer(request);
}
