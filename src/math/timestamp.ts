import type { Clock } from "../shared/time.js";
import { unixSeconds } from "../shared/time.js";
import { FixedUint, U64_MAX, assertInRange } from "./uint.js";

/** Whole seconds since the Unix epoch (u64). Zero means "never updated". */
export class UnixTimestamp extends FixedUint<UnixTimestamp> {
	static readonly ZERO = new UnixTimestamp(0n);

	private constructor(raw: bigint) {
		super(raw);
	}

	static of(seconds: bigint | number): UnixTimestamp {
		return new UnixTimestamp(assertInRange(BigInt(seconds), U64_MAX, "UnixTimestamp"));
	}

	/** Read the clock once and truncate to whole seconds. */
	static now(clock: Clock): UnixTimestamp {
		return UnixTimestamp.of(unixSeconds(clock));
	}

	protected bound(): bigint {
		return U64_MAX;
	}

	protected label(): string {
		return "UnixTimestamp";
	}

	protected rebuild(raw: bigint): UnixTimestamp {
		return new UnixTimestamp(raw);
	}
}
