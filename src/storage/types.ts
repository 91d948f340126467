/**
 * Position and global accumulator records owned by the PositionStore.
 *
 * Sizes, prices and values are USD E30; rates are 1e18; timestamps are
 * unix seconds.
 */

import type { PrimaryAccount } from "../shared/identifiers.js";

export interface Position {
	readonly primaryAccount: PrimaryAccount;
	readonly subAccountId: number;
	readonly marketIndex: number;
	/** Signed: positive long, negative short. Zero means absent. */
	readonly positionSizeE30: bigint;
	readonly avgEntryPriceE30: bigint;
	/** Asset class sumBorrowingRate at the last size change. */
	readonly entryBorrowingRate: bigint;
	/** The side's funding accumulator at the last size change. */
	readonly entryFundingRate: bigint;
	/** Pool value reserved against this position's maximum profit. */
	readonly reserveValueE30: bigint;
	readonly lastIncreaseTimestamp: number;
	readonly realizedPnlE30: bigint;
	/** Asset units (E30) this position contributes to its side's open interest. */
	readonly openInterest: bigint;
}

export interface GlobalMarketState {
	readonly longPositionSize: bigint;
	readonly longAvgPrice: bigint;
	readonly longOpenInterest: bigint;
	readonly shortPositionSize: bigint;
	readonly shortAvgPrice: bigint;
	readonly shortOpenInterest: bigint;
	/** Rate applied by the most recent funding update. Positive: longs receive. */
	readonly currentFundingRate: bigint;
	/**
	 * Cumulative funding per unit of size, both sides in long perspective:
	 * a rise pays longs and charges shorts.
	 */
	readonly accumFundingLong: bigint;
	readonly accumFundingShort: bigint;
	readonly lastFundingTime: number;
}

export interface GlobalAssetClassState {
	readonly sumBorrowingRate: bigint;
	readonly reserveValueE30: bigint;
	readonly lastBorrowingTime: number;
}

export const EMPTY_MARKET_STATE: GlobalMarketState = {
	longPositionSize: 0n,
	longAvgPrice: 0n,
	longOpenInterest: 0n,
	shortPositionSize: 0n,
	shortAvgPrice: 0n,
	shortOpenInterest: 0n,
	currentFundingRate: 0n,
	accumFundingLong: 0n,
	accumFundingShort: 0n,
	lastFundingTime: 0,
};

export const EMPTY_ASSET_CLASS_STATE: GlobalAssetClassState = {
	sumBorrowingRate: 0n,
	reserveValueE30: 0n,
	lastBorrowingTime: 0,
};

