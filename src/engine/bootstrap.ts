import { loadGovernanceFile } from "../governance/loader.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { type EngineConfig, configFromEnv, resolveConfig } from "../shared/config.js";
import { ConfigError, type PoolError, classifyError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok, tryCatch } from "../shared/result.js";
import { LeverageEngine } from "./leverage-engine.js";
import type { LeverageEngineDeps } from "./types.js";

/** Collaborators supplied by the host; governance and logging come from config. */
export type EngineHost = Omit<LeverageEngineDeps, "governance" | "logger">;

export function engineLogger(config: EngineConfig): Logger {
	return createLogger({ level: config.logLevel, name: config.name });
}

/**
 * Build an engine from configuration. `LEVPOOL_*` variables in `env` are
 * applied over the defaults, then `overrides` over both. The governance
 * snapshot at the resulting `governancePath` is loaded and validated.
 */
export async function createEngine(
	host: EngineHost,
	overrides: Partial<EngineConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): Promise<Result<LeverageEngine, PoolError>> {
	const resolved = tryCatch(() => resolveConfig({ ...configFromEnv(env), ...overrides }), classifyError);
	if (!resolved.ok) return resolved;
	const config = resolved.value;

	if (!config.governancePath) {
		return err(
			new ConfigError("No governance snapshot configured", {
				hint: "Set LEVPOOL_GOVERNANCE_PATH or EngineConfig.governancePath",
			}),
		);
	}

	const governance = await loadGovernanceFile(config.governancePath);
	if (!governance.ok) return governance;

	const logger = engineLogger(config);
	logger.info({ governance: governance.value.toJSON() }, "Governance snapshot loaded");
	return ok(new LeverageEngine({ ...host, governance: governance.value, logger }));
}
