/**
 * Zod schema for the serialized (JSON) form of ProtocolConfig.
 *
 * Fixed-point quantities are written as human decimal strings and parsed to
 * bigint at their scale: USD amounts to E30, rates to 1e18.
 */

import { z } from "../lib/validation/index.js";
import { RATE_DECIMALS, USD_DECIMALS, parseUnits } from "../shared/fixed-point.js";
import { assetId, tokenAddress } from "../shared/identifiers.js";
import type { ProtocolConfig } from "./types.js";

const BPS_MAX = 10_000;

const bps = z.number().int().min(0).max(BPS_MAX);

function scaledDecimal(decimals: number) {
	return z.union([z.string(), z.number()]).transform((value, ctx) => {
		try {
			const parsed = parseUnits(value, decimals);
			if (parsed < 0n) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must not be negative" });
				return z.NEVER;
			}
			return parsed;
		} catch (e) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: e instanceof Error ? e.message : "not a decimal",
			});
			return z.NEVER;
		}
	});
}

const address = z.string().transform((value, ctx) => {
	try {
		return tokenAddress(value);
	} catch (e) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: e instanceof Error ? e.message : "invalid address",
		});
		return z.NEVER;
	}
});

const collateralTokenSchema = z.object({
	token: address,
	assetId: z.string().min(1).transform(assetId),
	decimals: z.number().int().min(0).max(36),
	collateralFactorBps: bps,
	accepted: z.boolean().default(true),
});

const marketSchema = z
	.object({
		marketIndex: z.number().int().min(0),
		assetId: z.string().min(1).transform(assetId),
		assetClass: z.number().int().min(0),
		initialMarginFractionBps: bps.refine((v) => v > 0, "must be positive"),
		maintenanceMarginFractionBps: bps,
		increasePositionFeeRateBps: bps,
		decreasePositionFeeRateBps: bps,
		maxFundingRate: scaledDecimal(RATE_DECIMALS),
		maxSkewScaleUsd: scaledDecimal(USD_DECIMALS),
		maxProfitRateBps: z.number().int().min(0),
		active: z.boolean().default(true),
	})
	.refine((m) => m.maintenanceMarginFractionBps <= m.initialMarginFractionBps, {
		message: "maintenance margin fraction cannot exceed initial margin fraction",
		path: ["maintenanceMarginFractionBps"],
	})
	.transform(({ maxSkewScaleUsd, ...rest }) => ({ ...rest, maxSkewScaleUsdE30: maxSkewScaleUsd }));

const assetClassSchema = z.object({
	assetClass: z.number().int().min(0),
	baseBorrowingRate: scaledDecimal(RATE_DECIMALS),
});

export const protocolConfigSchema = z
	.object({
		fundingIntervalSeconds: z.number().int().positive(),
		devFeeRateBps: bps,
		pnlFactorBps: bps.default(BPS_MAX),
		liquidationFeeUsd: scaledDecimal(USD_DECIMALS).default("0"),
		oracle: z.object({
			maxPriceAgeSeconds: z.number().int().positive(),
			confidenceThresholdE6: z.number().int().min(0).default(0),
		}),
		collateralTokens: z.array(collateralTokenSchema).min(1),
		markets: z.array(marketSchema),
		assetClasses: z.array(assetClassSchema),
	})
	.superRefine((cfg, ctx) => {
		for (const i of duplicates(cfg.collateralTokens.map((t) => t.token))) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "duplicate token",
				path: ["collateralTokens", i, "token"],
			});
		}
		for (const i of duplicates(cfg.markets.map((m) => m.marketIndex))) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "duplicate marketIndex",
				path: ["markets", i, "marketIndex"],
			});
		}
		for (const i of duplicates(cfg.assetClasses.map((c) => c.assetClass))) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "duplicate assetClass",
				path: ["assetClasses", i, "assetClass"],
			});
		}
		const classes = new Set(cfg.assetClasses.map((c) => c.assetClass));
		cfg.markets.forEach((m, i) => {
			if (!classes.has(m.assetClass)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `unknown asset class ${m.assetClass}`,
					path: ["markets", i, "assetClass"],
				});
			}
		});
	})
	.transform(
		({ liquidationFeeUsd, ...rest }): ProtocolConfig => ({
			...rest,
			liquidationFeeUsdE30: liquidationFeeUsd,
		}),
	);

/** The JSON shape accepted by loadProtocolConfig(). */
export type RawProtocolConfig = z.input<typeof protocolConfigSchema>;

function duplicates<T>(values: readonly T[]): number[] {
	const seen = new Set<T>();
	const out: number[] = [];
	values.forEach((value, i) => {
		if (seen.has(value)) out.push(i);
		seen.add(value);
	});
	return out;
}
