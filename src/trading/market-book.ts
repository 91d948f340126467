import type { CallerCredential } from "../auth/types.js";
import { averageEntryPrice, reserveValueFor } from "../calculator/fee-calculator.js";
import type { MarketConfig } from "../config/types.js";
import { abs } from "../shared/fixed-point.js";
import type { PrimaryAccount } from "../shared/identifiers.js";
import type { PositionStore } from "../storage/position-store.js";
import type { GlobalMarketState, Position } from "../storage/types.js";

export interface Resize {
	/** Signed; zero closes the position. */
	readonly sizeE30: bigint;
	readonly openInterest: bigint;
	readonly avgEntryPriceE30: bigint;
	readonly realizedPnlE30: bigint;
	readonly lastIncreaseTimestamp: number;
}

/** A zero-size record to grow a new position from. */
export function emptyPosition(
	primaryAccount: PrimaryAccount,
	subAccountId: number,
	marketIndex: number,
): Position {
	return {
		primaryAccount,
		subAccountId,
		marketIndex,
		positionSizeE30: 0n,
		avgEntryPriceE30: 0n,
		entryBorrowingRate: 0n,
		entryFundingRate: 0n,
		reserveValueE30: 0n,
		lastIncreaseTimestamp: 0,
		realizedPnlE30: 0n,
		openInterest: 0n,
	};
}

/**
 * Moves a position's footprint in the global market and asset-class state
 * whenever its size changes.
 */
export class MarketBook {
	private readonly positions: PositionStore;
	private readonly credential: CallerCredential;

	constructor(positions: PositionStore, credential: CallerCredential) {
		this.positions = positions;
		this.credential = credential;
	}

	/**
	 * Saves `position` at its new size. The side totals, the side's average
	 * price and the asset class reserve follow, and the entry snapshots are
	 * re-taken from the current accumulators.
	 */
	resize(position: Position, market: MarketConfig, change: Resize): Position {
		const isLong =
			position.positionSizeE30 !== 0n ? position.positionSizeE30 > 0n : change.sizeE30 > 0n;
		const sizeDelta = abs(change.sizeE30) - abs(position.positionSizeE30);
		const oiDelta = change.openInterest - position.openInterest;

		const marketState = shiftSide(
			this.positions.marketState(market.marketIndex),
			isLong,
			sizeDelta,
			oiDelta,
		);
		this.positions.saveMarketState(this.credential, market.marketIndex, marketState);

		const reserveValueE30 = reserveValueFor(
			change.sizeE30,
			market.initialMarginFractionBps,
			market.maxProfitRateBps,
		);
		const assetClassState = this.positions.assetClassState(market.assetClass);
		this.positions.saveAssetClassState(this.credential, market.assetClass, {
			...assetClassState,
			reserveValueE30: assetClassState.reserveValueE30 + reserveValueE30 - position.reserveValueE30,
		});

		const next: Position = {
			...position,
			positionSizeE30: change.sizeE30,
			avgEntryPriceE30: change.sizeE30 === 0n ? 0n : change.avgEntryPriceE30,
			openInterest: change.openInterest,
			reserveValueE30,
			entryBorrowingRate: assetClassState.sumBorrowingRate,
			entryFundingRate: isLong ? marketState.accumFundingLong : marketState.accumFundingShort,
			realizedPnlE30: change.realizedPnlE30,
			lastIncreaseTimestamp: change.lastIncreaseTimestamp,
		};
		this.positions.savePosition(this.credential, next);
		return next;
	}
}

function shiftSide(
	state: GlobalMarketState,
	isLong: boolean,
	sizeDelta: bigint,
	oiDelta: bigint,
): GlobalMarketState {
	if (isLong) {
		const size = state.longPositionSize + sizeDelta;
		const oi = state.longOpenInterest + oiDelta;
		return {
			...state,
			longPositionSize: size,
			longOpenInterest: oi,
			longAvgPrice: averageEntryPrice(size, oi),
		};
	}
	const size = state.shortPositionSize + sizeDelta;
	const oi = state.shortOpenInterest + oiDelta;
	return {
		...state,
		shortPositionSize: size,
		shortOpenInterest: oi,
		shortAvgPrice: averageEntryPrice(size, oi),
	};
}
