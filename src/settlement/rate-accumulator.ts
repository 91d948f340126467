/**
 * RateAccumulator — folds per-interval borrowing and funding rates into
 * the global accumulators.
 *
 * Updates are aligned to the funding interval: the first call only stamps
 * lastUpdateTime to the current interval boundary; later calls accrue one
 * interval's rate once a full interval has passed and move lastUpdateTime
 * to the latest boundary. Calls within an interval change no accumulator.
 */

import type { CallerCredential } from "../auth/types.js";
import type { PriceReader } from "../calculator/price-reader.js";
import {
	type PriceOverride,
	type RateCalculator,
	splitFundingRate,
} from "../calculator/rate-calculator.js";
import type { ConfigStore } from "../config/config-store.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type OracleError, PositionError } from "../shared/errors.js";
import type { AssetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, floorToInterval, unixSeconds } from "../shared/time.js";
import type { PositionStore } from "../storage/position-store.js";
import type { GlobalAssetClassState, GlobalMarketState } from "../storage/types.js";

export interface RateAccumulatorDeps {
	readonly positions: PositionStore;
	readonly config: ConfigStore;
	readonly calculator: RateCalculator;
	readonly prices: PriceReader;
	readonly clock: Clock;
	readonly credential: CallerCredential;
	readonly logger?: Logger;
}

export class RateAccumulator {
	private readonly positions: PositionStore;
	private readonly config: ConfigStore;
	private readonly calculator: RateCalculator;
	private readonly prices: PriceReader;
	private readonly clock: Clock;
	private readonly credential: CallerCredential;
	private readonly logger: Logger;

	constructor(deps: RateAccumulatorDeps) {
		this.positions = deps.positions;
		this.config = deps.config;
		this.calculator = deps.calculator;
		this.prices = deps.prices;
		this.clock = deps.clock;
		this.credential = deps.credential;
		this.logger = (deps.logger ?? silentLogger()).child({ module: "rate-accumulator" });
	}

	/**
	 * Accrues the asset class's borrowing rate. `overridePrice` replaces the
	 * oracle price of `overrideAsset` when valuing the pool.
	 */
	updateBorrowingRate(
		assetClass: number,
		overridePrice?: bigint,
		overrideAsset?: AssetId,
	): Result<GlobalAssetClassState, OracleError> {
		const state = this.positions.assetClassState(assetClass);
		const now = unixSeconds(this.clock);
		const interval = this.config.fundingIntervalSeconds();
		let next = state;

		if (state.lastBorrowingTime === 0) {
			next = { ...state, lastBorrowingTime: floorToInterval(now, interval) };
		} else if (state.lastBorrowingTime + interval <= now) {
			const override: PriceOverride | undefined =
				overridePrice !== undefined && overrideAsset !== undefined
					? { asset: overrideAsset, priceE30: overridePrice }
					: undefined;
			const rate = this.calculator.nextBorrowingRate(assetClass, override);
			if (!rate.ok) return rate;
			next = {
				...state,
				sumBorrowingRate: state.sumBorrowingRate + rate.value,
				lastBorrowingTime: floorToInterval(now, interval),
			};
			this.logger.debug({ assetClass, rate: rate.value }, "borrowing rate accrued");
		}

		this.positions.saveAssetClassState(this.credential, assetClass, next);
		return ok(next);
	}

	/**
	 * Accrues the market's funding rate, split between the long and short
	 * accumulators. `overridePrice` replaces the oracle mark price.
	 */
	updateFundingRate(
		marketIndex: number,
		overridePrice?: bigint,
	): Result<GlobalMarketState, OracleError | PositionError> {
		const market = this.config.market(marketIndex);
		if (!market) {
			return err(new PositionError("MarketNotFound", `Market ${marketIndex} is not configured`));
		}
		const state = this.positions.marketState(marketIndex);
		const now = unixSeconds(this.clock);
		const interval = this.config.fundingIntervalSeconds();
		let next = state;

		if (state.lastFundingTime === 0) {
			next = { ...state, lastFundingTime: floorToInterval(now, interval) };
		} else if (state.lastFundingTime + interval <= now) {
			let markPrice = overridePrice;
			if (markPrice === undefined) {
				const read = this.prices(market.assetId, false);
				if (!read.ok) return read;
				markPrice = read.value;
			}
			const rate = this.calculator.nextFundingRate(marketIndex, markPrice);
			const split = splitFundingRate(rate, state);
			next = {
				...state,
				currentFundingRate: rate,
				accumFundingLong: state.accumFundingLong + split.longDelta,
				accumFundingShort: state.accumFundingShort + split.shortDelta,
				lastFundingTime: floorToInterval(now, interval),
			};
			this.logger.debug({ marketIndex, rate, ...split }, "funding rate accrued");
		}

		this.positions.saveMarketState(this.credential, marketIndex, next);
		return ok(next);
	}
}
