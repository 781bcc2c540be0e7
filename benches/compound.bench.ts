import { bench, describe } from "vitest";
import { calculateCompounded } from "../src/interest/compound.js";
import { Rate } from "../src/math/fixed-point.js";
import { UnixTimestamp } from "../src/math/timestamp.js";

describe("compound interest", () => {
	const rate = Rate.of(1_268_391_679_350_583_460n);
	const start = UnixTimestamp.of(1_700_000_000n);

	bench("one hour 1000x", () => {
		const end = UnixTimestamp.of(1_700_003_600n);
		for (let i = 0; i < 1000; i++) {
			calculateCompounded(rate, start, end);
		}
	});

	bench("one year 1000x", () => {
		const end = UnixTimestamp.of(1_731_536_000n);
		for (let i = 0; i < 1000; i++) {
			calculateCompounded(rate, start, end);
		}
	});
});
