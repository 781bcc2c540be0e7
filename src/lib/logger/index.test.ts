import { describe, expect, it } from "vitest";
import { TokenAmount } from "../../math/fixed-point.js";
import { createLogger, loggableFields } from "./index.js";

function capture(level: "debug" | "info" | "warn" = "info", extra: { name?: string; redactPaths?: string[] } = {}) {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		...extra,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	const records = (): Array<Record<string, unknown>> => lines.map((line) => JSON.parse(line));
	return { logger, lines, records };
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("binds the configured name to every line", () => {
			const { logger, records } = capture("info", { name: "leverage-pool" });

			logger.info("ready");

			expect(records()[0]?.["name"]).toBe("leverage-pool");
			expect(records()[0]?.["msg"]).toBe("ready");
		});

		it("child loggers carry their bindings", () => {
			const { logger, records } = capture();

			logger.child({ reserve: "usdc" }).child({ op: "deposit" }).info("committed");

			expect(records()[0]).toMatchObject({ reserve: "usdc", op: "deposit", msg: "committed" });
		});
	});

	describe("amounts", () => {
		it("writes bigints as decimal strings", () => {
			const { logger, records } = capture();

			logger.info({ amount: 18_446_744_073_709_551_615n, nested: { debt: 200_000n } }, "deposit");

			expect(records()[0]).toMatchObject({
				amount: "18446744073709551615",
				nested: { debt: "200000" },
			});
		});

		it("writes fixed-point values through their toJSON", () => {
			const { logger, records } = capture();

			logger.info({ loan: TokenAmount.of(200_000) }, "open");

			expect(records()[0]?.["loan"]).toBe("200000");
		});
	});

	describe("loggableFields", () => {
		it("converts bigints inside arrays", () => {
			expect(loggableFields({ fills: [1n, 2n] })).toEqual({ fills: ["1", "2"] });
		});

		it("marks circular references instead of recursing", () => {
			const circular: Record<string, unknown> = { name: "test" };
			circular["self"] = circular;

			expect(loggableFields(circular)).toEqual({ name: "test", self: "[Circular]" });
		});
	});

	describe("redact paths", () => {
		it("censors configured paths in log output", () => {
			const { logger, lines } = capture("info", { redactPaths: ["authority"] });

			logger.info({ authority: "test-secret", reserve: "usdc" }, "transfer");

			const output = lines.join("");
			expect(output).not.toContain("test-secret");
			expect(output).toContain("[REDACTED]");
			expect(output).toContain("usdc");
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { logger, lines } = capture("warn");

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(lines.length).toBe(1);
			expect(lines[0]).toContain("should appear");
		});

		it("accepts every level", () => {
			const validLevels = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
			for (const level of validLevels) {
				expect(() => createLogger({ level })).not.toThrow();
			}
		});
	});
});
