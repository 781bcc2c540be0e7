/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Field values are made JSON-safe before they reach pino: bigints become
 * decimal strings and fixed-point values log through their own toJSON().
 * Path-based redaction is configurable for sensitive fields.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bound as `name` on every line */
	readonly name?: string;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Serialization ───────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function loggable(value: unknown, seen: WeakSet<object>): unknown {
	if (typeof value === "bigint") return value.toString();
	if (Array.isArray(value) || isPlainObject(value)) {
		if (seen.has(value)) return "[Circular]";
		seen.add(value);
		if (Array.isArray(value)) return value.map((item) => loggable(item, seen));
		return copyFields(value, seen);
	}
	return value;
}

function copyFields(fields: Record<string, unknown>, seen: WeakSet<object>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(fields)) {
		result[key] = loggable(value, seen);
	}
	return result;
}

/** Copy of `fields` with every bigint, at any depth, rendered as a string. */
export function loggableFields(fields: Record<string, unknown>): Record<string, unknown> {
	return copyFields(fields, new WeakSet<object>([fields]));
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function writer(pinoLogger: pino.Logger, level: Level) {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](loggableFields(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: writer(pinoLogger, "info"),
		warn: writer(pinoLogger, "warn"),
		error: writer(pinoLogger, "error"),
		debug: writer(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(loggableFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "leverage-pool" });
 * logger.info({ reserve: "usdc", amount: 1_000n }, "Deposit committed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}
