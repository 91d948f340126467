import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { CollateralTokenConfig } from "../config/types.js";
import { tokenAmountToUsd } from "../shared/fixed-point.js";
import { type AssetId, type TokenAddress, assetId, tokenAddress } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import { walkTokens } from "./token-walk.js";

const TOKENS: CollateralTokenConfig[] = [
	{ suffix: "1", asset: "USDC", decimals: 6 },
	{ suffix: "2", asset: "ETH", decimals: 18 },
	{ suffix: "3", asset: "BTC", decimals: 8 },
].map(({ suffix, asset, decimals }) => ({
	token: tokenAddress(`0x${suffix.repeat(40)}`),
	assetId: assetId(asset),
	decimals,
	collateralFactorBps: 10_000,
	accepted: true,
}));

const E30 = 10n ** 30n;

describe("walkTokens properties", () => {
	it("conserves value: debits at walk prices sum to what was covered", () => {
		fc.assert(
			fc.property(
				fc.array(fc.bigInt({ min: 0n, max: 10n ** 24n }), { minLength: 3, maxLength: 3 }),
				fc.array(fc.bigInt({ min: 1n, max: 100_000n }), { minLength: 3, maxLength: 3 }),
				fc.bigInt({ min: 1n, max: 10n ** 8n }),
				(balances, wholePrices, owedUsd) => {
					const priceOf = new Map<AssetId, bigint>(
						TOKENS.map((t, i) => [t.assetId, (wholePrices[i] ?? 1n) * E30]),
					);
					const held = new Map<TokenAddress, bigint>(
						TOKENS.map((t, i) => [t.token, balances[i] ?? 0n]),
					);
					const before = new Map(held);
					const owedE30 = owedUsd * E30;

					const result = walkTokens({
						owedE30,
						tokens: TOKENS,
						prices: (asset) => ok(priceOf.get(asset) ?? E30),
						source: {
							balanceOf: (token) => held.get(token) ?? 0n,
							debit: (token, amount) => held.set(token, (held.get(token) ?? 0n) - amount),
						},
					});
					if (!result.ok) throw result.error;
					const { legs, coveredE30, remainingE30 } = result.value;

					const legValue = legs.reduce((sum, leg) => sum + leg.valueE30, 0n);
					expect(legValue).toBe(coveredE30);
					expect(coveredE30 + remainingE30).toBe(owedE30);
					expect(remainingE30 >= 0n).toBe(true);

					for (const t of TOKENS) {
						const debited = (before.get(t.token) ?? 0n) - (held.get(t.token) ?? 0n);
						expect(debited >= 0n).toBe(true);
						const leg = legs.find((l) => l.token === t.token);
						expect(debited).toBe(leg?.amount ?? 0n);
						if (leg) {
							// never credits more value than the tokens taken are worth
							expect(leg.valueE30 <= tokenAmountToUsd(leg.amount, leg.priceE30, t.decimals)).toBe(
								true,
							);
						}
					}

					if (remainingE30 > 0n) {
						for (const t of TOKENS) expect(held.get(t.token)).toBe(0n);
					}
				},
			),
		);
	});
});
