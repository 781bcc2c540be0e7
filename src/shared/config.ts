/**
 * Engine configuration.
 *
 * Governance parameters are not part of this config: they are a validated
 * snapshot loaded separately (see governance/loader.ts). This only covers
 * how the engine runs.
 */

import { ConfigError } from "./errors.js";

/** Log levels accepted by the engine logger. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type EngineLogLevel = (typeof LOG_LEVELS)[number];

export interface EngineConfig {
	/** Human-readable deployment name, bound into every log line */
	readonly name: string;
	/** Minimum log level */
	readonly logLevel: EngineLogLevel;
	/** Path to a governance snapshot JSON file (optional) */
	readonly governancePath?: string | undefined;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	name: "leverage-pool",
	logLevel: "info",
};

/** Mutable builder shape for constructing Partial<EngineConfig>. */
interface MutableEngineConfig {
	name?: string;
	logLevel?: EngineLogLevel;
	governancePath?: string;
}

function isLogLevel(raw: string): raw is EngineLogLevel {
	return (LOG_LEVELS as readonly string[]).includes(raw);
}

/**
 * Reads engine config values from environment variables.
 * Supported: LEVPOOL_NAME, LEVPOOL_LOG_LEVEL, LEVPOOL_GOVERNANCE_PATH.
 * @throws ConfigError if LEVPOOL_LOG_LEVEL is not a known level
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const envName = env["LEVPOOL_NAME"]?.trim();
	if (envName) {
		result.name = envName;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawLevel = env["LEVPOOL_LOG_LEVEL"]?.trim();
	if (rawLevel) {
		if (!isLogLevel(rawLevel)) {
			throw new ConfigError(
				`Invalid LEVPOOL_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = rawLevel;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const governancePath = env["LEVPOOL_GOVERNANCE_PATH"]?.trim();
	if (governancePath) {
		result.governancePath = governancePath;
	}

	return result;
}

/** Merge environment overrides onto the defaults. */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
	return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}
