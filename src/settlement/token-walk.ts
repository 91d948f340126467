/**
 * Multi-token repayment walk.
 *
 * Visits tokens in configured order and draws from the payer until the USD
 * amount owed is covered. Legs are debited as they are taken, so the caller
 * must run the walk inside a transaction.
 *
 * Rounding always favours the pool. When a trader pays in, a covering leg
 * takes the token amount needed at the min price rounded up, and a drained
 * leg is valued rounded down. When the pool pays out, prices are read at
 * the max, a covering leg is rounded down and a drained leg is valued
 * rounded up. A payout remainder worth less than one token unit is kept.
 */

import type { PriceReader } from "../calculator/price-reader.js";
import type { CollateralTokenConfig } from "../config/types.js";
import type { OracleError } from "../shared/errors.js";
import { tokenAmountToUsd, usdToTokenAmount } from "../shared/fixed-point.js";
import type { TokenAddress } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";

/** Balances the walk draws from. */
export interface WalkSource {
	balanceOf(token: TokenAddress): bigint;
	debit(token: TokenAddress, amount: bigint): void;
}

export interface WalkLeg {
	readonly token: TokenAddress;
	readonly amount: bigint;
	readonly valueE30: bigint;
	readonly priceE30: bigint;
}

export interface WalkOutcome {
	readonly legs: readonly WalkLeg[];
	readonly coveredE30: bigint;
	/** Zero when the payer covered everything. */
	readonly remainingE30: bigint;
}

/** `collect`: a trader pays the pool. `payout`: the pool pays a trader. */
export type WalkDirection = "collect" | "payout";

export interface WalkParams {
	readonly owedE30: bigint;
	/** Defaults to `collect`. */
	readonly direction?: WalkDirection;
	readonly tokens: readonly CollateralTokenConfig[];
	readonly source: WalkSource;
	readonly prices: PriceReader;
	/** Called once per leg, after the debit. */
	readonly onLeg?: (leg: WalkLeg) => void;
}

export function walkTokens(params: WalkParams): Result<WalkOutcome, OracleError> {
	const { owedE30, tokens, source, prices, onLeg } = params;
	const payout = params.direction === "payout";
	const legs: WalkLeg[] = [];
	let remaining = owedE30;

	for (const config of tokens) {
		if (remaining <= 0n) break;
		const balance = source.balanceOf(config.token);
		if (balance === 0n) continue;

		const price = prices(config.assetId, payout);
		if (!price.ok) return price;

		const needed = usdToTokenAmount(
			remaining,
			price.value,
			config.decimals,
			payout ? "floor" : "ceil",
		);
		if (needed === 0n) {
			remaining = 0n;
			break;
		}
		let leg: WalkLeg;
		if (needed <= balance) {
			leg = { token: config.token, amount: needed, valueE30: remaining, priceE30: price.value };
		} else {
			const value = tokenAmountToUsd(
				balance,
				price.value,
				config.decimals,
				payout ? "ceil" : "floor",
			);
			leg = { token: config.token, amount: balance, valueE30: value, priceE30: price.value };
		}

		source.debit(config.token, leg.amount);
		remaining -= leg.valueE30;
		legs.push(leg);
		onLeg?.(leg);
	}

	return ok({ legs, coveredE30: owedE30 - remaining, remainingE30: remaining });
}
