/**
 * RecordStore — persistence port for the three record kinds.
 *
 * The engine reads records at the start of an operation and hands every
 * changed record to `commit()` once, after the operation succeeded.
 */

import type { MarketRecord, PositionRecord } from "../position/types.js";
import type { ReserveRecord } from "../reserve/types.js";
import type { MarketId, ReserveId, TraderId } from "../shared/identifiers.js";

export interface RecordChanges {
	readonly reserves?: readonly ReserveRecord[];
	readonly markets?: readonly MarketRecord[];
	readonly positions?: readonly PositionRecord[];
}

export interface RecordStore {
	reserve(id: ReserveId): Promise<ReserveRecord | undefined>;
	market(id: MarketId): Promise<MarketRecord | undefined>;
	position(market: MarketId, trader: TraderId): Promise<PositionRecord | undefined>;
	/** Apply every change or none. */
	commit(changes: RecordChanges): Promise<void>;
}
