/**
 * MemoryRecordStore — in-memory RecordStore for tests, examples and
 * single-process use. Not persisted across restarts.
 */

import type { MarketRecord, PositionRecord } from "../position/types.js";
import type { ReserveRecord } from "../reserve/types.js";
import type { MarketId, ReserveId, TraderId } from "../shared/identifiers.js";
import { positionKey } from "../shared/identifiers.js";
import type { RecordChanges, RecordStore } from "./record-store.js";

export class MemoryRecordStore implements RecordStore {
	private readonly reserves = new Map<ReserveId, ReserveRecord>();
	private readonly markets = new Map<MarketId, MarketRecord>();
	private readonly positions = new Map<string, PositionRecord>();
	private commits = 0;

	async reserve(id: ReserveId): Promise<ReserveRecord | undefined> {
		return this.reserves.get(id);
	}

	async market(id: MarketId): Promise<MarketRecord | undefined> {
		return this.markets.get(id);
	}

	async position(market: MarketId, trader: TraderId): Promise<PositionRecord | undefined> {
		return this.positions.get(positionKey(market, trader));
	}

	/** Synchronous map writes; nothing can fail half-way. */
	async commit(changes: RecordChanges): Promise<void> {
		for (const reserve of changes.reserves ?? []) {
			this.reserves.set(reserve.id, reserve);
		}
		for (const market of changes.markets ?? []) {
			this.markets.set(market.id, market);
		}
		for (const position of changes.positions ?? []) {
			this.positions.set(positionKey(position.marketId, position.trader), position);
		}
		this.commits++;
	}

	/** Number of successful commits, for asserting that failed operations wrote nothing. */
	get commitCount(): number {
		return this.commits;
	}
}
