import { readFile } from "node:fs/promises";
import type { ValidationError } from "../lib/validation/index.js";
import { ConfigError } from "../shared/errors.js";
import { err } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { Governance } from "./governance.js";

/**
 * Read a governance snapshot from a JSON file.
 *
 * Unreadable files and malformed JSON are ConfigErrors; a well-formed file
 * with bad values fails schema validation.
 */
export async function loadGovernanceFile(
	path: string,
): Promise<Result<Governance, ValidationError | ConfigError>> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (e) {
		return err(new ConfigError(`Cannot read governance file ${path}`, { path, cause: e }));
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (e) {
		return err(new ConfigError(`Governance file ${path} is not valid JSON`, { path, cause: e }));
	}

	return Governance.parse(json);
}
