import { describe, expect, it } from "vitest";
import { TokenAmount } from "../math/fixed-point.js";
import { EMPTY_POSITION_STATE, type PositionRecord, PositionStatus } from "../position/types.js";
import { marketId, reserveId, traderId, vaultId } from "../shared/identifiers.js";
import { reserveRecord } from "../testing/records.js";
import { MemoryRecordStore } from "./memory-record-store.js";

function position(trader: string, status: PositionStatus = PositionStatus.Uninitialized): PositionRecord {
	return {
		marketId: marketId("sol-usdc"),
		trader: traderId(trader),
		receiptAccount: vaultId(`sol-usdc:${trader}:receipt`),
		status,
		state: EMPTY_POSITION_STATE,
	};
}

describe("MemoryRecordStore", () => {
	it("returns undefined for unknown records", async () => {
		const store = new MemoryRecordStore();
		expect(await store.reserve(reserveId("usdc"))).toBeUndefined();
		expect(await store.market(marketId("sol-usdc"))).toBeUndefined();
		expect(await store.position(marketId("sol-usdc"), traderId("bob"))).toBeUndefined();
	});

	it("commits every record in a change set", async () => {
		const store = new MemoryRecordStore();
		const reserve = reserveRecord();
		await store.commit({ reserves: [reserve], positions: [position("bob"), position("carol")] });

		expect(await store.reserve(reserve.id)).toBe(reserve);
		expect((await store.position(marketId("sol-usdc"), traderId("carol")))?.trader).toBe("carol");
		expect(store.commitCount).toBe(1);
	});

	it("replaces a record under the same key", async () => {
		const store = new MemoryRecordStore();
		await store.commit({ positions: [position("bob")] });
		const opened: PositionRecord = {
			...position("bob", PositionStatus.Open),
			state: { ...EMPTY_POSITION_STATE, amount: TokenAmount.of(5n) },
		};
		await store.commit({ positions: [opened] });

		const stored = await store.position(marketId("sol-usdc"), traderId("bob"));
		expect(stored?.status).toBe(PositionStatus.Open);
		expect(stored?.state.amount.raw).toBe(5n);
		expect(store.commitCount).toBe(2);
	});

	it("counts an empty change set as a commit", async () => {
		const store = new MemoryRecordStore();
		await store.commit({});
		expect(store.commitCount).toBe(1);
	});
});
