/**
 * Fee and PnL formulas. Pure functions over bigint fixed point.
 *
 * Funding fees are signed in long perspective: positive means a long
 * receives (or a short pays). Wherever a division leaves a remainder, the
 * rounding goes against the trader.
 */

import { BPS, E30, RATE_PRECISION, abs, mulDiv } from "../shared/fixed-point.js";
import type { GlobalAssetClassState, GlobalMarketState, Position } from "../storage/types.js";

/** |sizeDelta| × feeRateBps / BPS. */
export function tradingFeeUsd(absSizeDeltaE30: bigint, feeRateBps: number): bigint {
	return mulDiv(abs(absSizeDeltaE30), BigInt(feeRateBps), BPS);
}

/** reserveValue × (sumBorrowingRate − entryBorrowingRate) / 1e18. */
export function borrowingFeeUsd(
	reserveValueE30: bigint,
	sumBorrowingRate: bigint,
	entryBorrowingRate: bigint,
): bigint {
	const accrued = sumBorrowingRate - entryBorrowingRate;
	if (accrued <= 0n) return 0n;
	return mulDiv(reserveValueE30, accrued, RATE_PRECISION, "ceil");
}

/** The funding accumulator for the side a signed size sits on. */
export function sideFundingAccumulator(state: GlobalMarketState, sizeE30: bigint): bigint {
	return sizeE30 >= 0n ? state.accumFundingLong : state.accumFundingShort;
}

/** True when a position with this size and funding fee pays the pool. */
export function traderPaysFunding(sizeE30: bigint, fundingFeeE30: bigint): boolean {
	return sizeE30 > 0n !== fundingFeeE30 > 0n;
}

/** |size| × (accumulator − entry) / 1e18, signed. */
export function fundingFeeUsd(
	sizeE30: bigint,
	accumulator: bigint,
	entryFundingRate: bigint,
): bigint {
	const delta = accumulator - entryFundingRate;
	if (delta === 0n || sizeE30 === 0n) return 0n;
	const feeSign = delta > 0n ? 1n : -1n;
	const rounding = traderPaysFunding(sizeE30, delta) ? "ceil" : "floor";
	return feeSign * mulDiv(abs(sizeE30), abs(delta), RATE_PRECISION, rounding);
}

/** Borrowing and funding accrued on a position since its entry snapshots. */
export interface PendingFees {
	readonly borrowingFeeE30: bigint;
	/** Signed, long perspective. */
	readonly fundingFeeE30: bigint;
}

export function pendingFees(
	position: Position,
	market: GlobalMarketState,
	assetClass: GlobalAssetClassState,
): PendingFees {
	return {
		borrowingFeeE30: borrowingFeeUsd(
			position.reserveValueE30,
			assetClass.sumBorrowingRate,
			position.entryBorrowingRate,
		),
		fundingFeeE30: fundingFeeUsd(
			position.positionSizeE30,
			sideFundingAccumulator(market, position.positionSizeE30),
			position.entryFundingRate,
		),
	};
}

/**
 * What pending fees cost the trader in USD: borrowing plus funding owed,
 * minus funding receivable.
 */
export function pendingFeeCost(position: Position, fees: PendingFees): bigint {
	const funding = traderPaysFunding(position.positionSizeE30, fees.fundingFeeE30)
		? abs(fees.fundingFeeE30)
		: -abs(fees.fundingFeeE30);
	return fees.borrowingFeeE30 + funding;
}

// ── PnL and averages ─────────────────────────────────────────────────

/**
 * PnL of `sizeE30` (signed) opened at `avgPriceE30` and valued at `priceE30`.
 * Long: |size| × (price − avg) / avg. Short mirrored.
 */
export function positionPnlUsd(sizeE30: bigint, avgPriceE30: bigint, priceE30: bigint): bigint {
	if (sizeE30 === 0n || avgPriceE30 === 0n) return 0n;
	const move = sizeE30 > 0n ? priceE30 - avgPriceE30 : avgPriceE30 - priceE30;
	return mulDiv(abs(sizeE30), move, avgPriceE30);
}

/** Asset units (E30) bought by `sizeE30` USD at `priceE30`. */
export function openInterestFor(sizeE30: bigint, priceE30: bigint): bigint {
	return mulDiv(abs(sizeE30), E30, priceE30);
}

/**
 * Size-weighted harmonic mean entry price:
 * (S1 + S2) / (S1 / P1 + S2 / P2), with S/P carried as open interest.
 */
export function averageEntryPrice(totalSizeE30: bigint, totalOpenInterest: bigint): bigint {
	if (totalOpenInterest === 0n) return 0n;
	return mulDiv(abs(totalSizeE30), E30, totalOpenInterest);
}

/** Reserve value held by the pool against a position's maximum profit. */
export function reserveValueFor(
	sizeE30: bigint,
	initialMarginFractionBps: number,
	maxProfitRateBps: number,
): bigint {
	const imr = mulDiv(abs(sizeE30), BigInt(initialMarginFractionBps), BPS);
	return mulDiv(imr, BigInt(maxProfitRateBps), BPS);
}
