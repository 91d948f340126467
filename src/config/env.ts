/**
 * Environment overrides for the scalar protocol settings.
 *
 * Supported: PERP_FUNDING_INTERVAL_SECONDS, PERP_DEV_FEE_RATE_BPS,
 * PERP_PNL_FACTOR_BPS, PERP_PRICE_MAX_AGE_SECONDS.
 */

import { ConfigError } from "../shared/errors.js";

/** Scalar settings an operator may override without editing the config file. */
export interface ConfigOverrides {
	fundingIntervalSeconds?: number;
	devFeeRateBps?: number;
	pnlFactorBps?: number;
	maxPriceAgeSeconds?: number;
}

const BPS_MAX = 10_000;

/**
 * Reads overrides from the environment.
 * @throws ConfigError if a variable is set to an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
	const result: ConfigOverrides = {};

	const interval = parseIntEnv(env, "PERP_FUNDING_INTERVAL_SECONDS", 1);
	if (interval !== undefined) result.fundingIntervalSeconds = interval;

	const devFee = parseIntEnv(env, "PERP_DEV_FEE_RATE_BPS", 0, BPS_MAX);
	if (devFee !== undefined) result.devFeeRateBps = devFee;

	const pnlFactor = parseIntEnv(env, "PERP_PNL_FACTOR_BPS", 0, BPS_MAX);
	if (pnlFactor !== undefined) result.pnlFactorBps = pnlFactor;

	const maxAge = parseIntEnv(env, "PERP_PRICE_MAX_AGE_SECONDS", 1);
	if (maxAge !== undefined) result.maxPriceAgeSeconds = maxAge;

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(
	env: NodeJS.ProcessEnv,
	key: string,
	minValue: number,
	maxValue = Number.MAX_SAFE_INTEGER,
): number | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim() === "") return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < minValue || parsed > maxValue) {
		throw new ConfigError(
			`Invalid ${key}: "${raw}" must be an integer in [${minValue}, ${maxValue}]`,
			{ key },
		);
	}
	return parsed;
}
