import { describe, expect, it } from "vitest";
import {
	authorityId,
	marketId,
	mintId,
	positionKey,
	reserveId,
	traderAuthority,
	traderId,
	vaultId,
} from "./identifiers.js";

describe("branded identifiers", () => {
	it("trims the raw value", () => {
		expect(reserveId("  usdc ")).toBe("usdc");
		expect(vaultId("alice:usdc\n")).toBe("alice:usdc");
	});

	it.each([
		["ReserveId", () => reserveId("")],
		["MarketId", () => marketId("  ")],
		["TraderId", () => traderId("")],
		["VaultId", () => vaultId("\t")],
		["MintId", () => mintId("")],
		["AuthorityId", () => authorityId(" ")],
	])("rejects an empty %s", (label, create) => {
		expect(create).toThrow(`${label} cannot be empty`);
	});

	it("a trader signs as itself", () => {
		expect(traderAuthority(traderId("bob"))).toBe(authorityId("bob"));
	});

	it("keys positions by market and trader", () => {
		expect(positionKey(marketId("sol-usdc"), traderId("bob"))).toBe("sol-usdc/bob");
		expect(positionKey(marketId("sol-usdc"), traderId("bob"))).not.toBe(
			positionKey(marketId("sol-usdc"), traderId("carol")),
		);
	});
});
