/**
 * Protocol config loading: validate the JSON form, then apply environment
 * overrides on top.
 */

import { readFile } from "node:fs/promises";
import { type ValidationError, validate } from "../lib/validation/index.js";
import { ConfigError } from "../shared/errors.js";
import { type Result, err, map } from "../shared/result.js";
import { type ConfigOverrides, configFromEnv } from "./env.js";
import { protocolConfigSchema } from "./schema.js";
import type { ProtocolConfig } from "./types.js";

/** Merge scalar overrides into a validated config. */
export function applyOverrides(config: ProtocolConfig, overrides: ConfigOverrides): ProtocolConfig {
	return {
		...config,
		fundingIntervalSeconds: overrides.fundingIntervalSeconds ?? config.fundingIntervalSeconds,
		devFeeRateBps: overrides.devFeeRateBps ?? config.devFeeRateBps,
		pnlFactorBps: overrides.pnlFactorBps ?? config.pnlFactorBps,
		oracle: {
			...config.oracle,
			maxPriceAgeSeconds: overrides.maxPriceAgeSeconds ?? config.oracle.maxPriceAgeSeconds,
		},
	};
}

/**
 * Validates a raw config object and applies overrides from `env`.
 * @throws ConfigError if an environment override is malformed
 */
export function loadProtocolConfig(
	raw: unknown,
	env: NodeJS.ProcessEnv = process.env,
): Result<ProtocolConfig, ValidationError> {
	const overrides = configFromEnv(env);
	return map(validate(protocolConfigSchema, raw), (config) => applyOverrides(config, overrides));
}

/** Reads a JSON config file and loads it like loadProtocolConfig(). */
export async function loadProtocolConfigFile(
	path: string,
	env: NodeJS.ProcessEnv = process.env,
): Promise<Result<ProtocolConfig, ValidationError | ConfigError>> {
	let raw: unknown;
	try {
		raw = JSON.parse(await readFile(path, "utf8"));
	} catch (e) {
		return err(new ConfigError(`Cannot read protocol config at ${path}`, { path, cause: e }));
	}
	return loadProtocolConfig(raw, env);
}
