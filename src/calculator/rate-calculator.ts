/**
 * RateCalculator — per-interval borrowing and funding rates.
 *
 * Borrowing: baseBorrowingRate × reserved value / pool TVL. Funding:
 * −clamp(skew / maxSkewScale, −1, 1) × maxFundingRate, where skew is long
 * minus short open interest at the mark price. A positive funding rate
 * pays longs.
 */

import type { ConfigStore } from "../config/config-store.js";
import type { OracleError } from "../shared/errors.js";
import { E30, RATE_PRECISION, abs, clamp, min, mulDiv } from "../shared/fixed-point.js";
import type { AssetId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import type { PositionStore } from "../storage/position-store.js";
import type { GlobalMarketState } from "../storage/types.js";
import type { PriceReader } from "./price-reader.js";

/** Substitute price for one asset while valuing the pool. */
export interface PriceOverride {
	readonly asset: AssetId;
	readonly priceE30: bigint;
}

/** Per-unit accumulator increments for one interval, long perspective. */
export interface FundingSplit {
	readonly longDelta: bigint;
	readonly shortDelta: bigint;
}

export class RateCalculator {
	private readonly ledger: LedgerStore;
	private readonly positions: PositionStore;
	private readonly config: ConfigStore;
	private readonly prices: PriceReader;

	constructor(
		ledger: LedgerStore,
		positions: PositionStore,
		config: ConfigStore,
		prices: PriceReader,
	) {
		this.ledger = ledger;
		this.positions = positions;
		this.config = config;
		this.prices = prices;
	}

	/** Σ pool liquidity × min price over every collateral token the pool holds. */
	poolTvlE30(override?: PriceOverride): Result<bigint, OracleError> {
		let tvl = 0n;
		for (const token of this.config.collateralTokens()) {
			const liquidity = this.ledger.poolLiquidity(token.token);
			if (liquidity === 0n) continue;
			let price: bigint;
			if (override && override.asset === token.assetId) {
				price = override.priceE30;
			} else {
				const read = this.prices(token.assetId, false);
				if (!read.ok) return read;
				price = read.value;
			}
			tvl += mulDiv(liquidity, price, 10n ** BigInt(token.decimals));
		}
		return ok(tvl);
	}

	/** One interval's borrowing rate for an asset class; zero on an empty pool. */
	nextBorrowingRate(assetClass: number, override?: PriceOverride): Result<bigint, OracleError> {
		const config = this.config.assetClass(assetClass);
		if (!config) return ok(0n);
		const reserved = this.positions.assetClassState(assetClass).reserveValueE30;
		if (reserved === 0n) return ok(0n);

		const tvl = this.poolTvlE30(override);
		if (!tvl.ok) return tvl;
		if (tvl.value === 0n) return ok(0n);
		return ok(mulDiv(config.baseBorrowingRate, reserved, tvl.value));
	}

	/** One interval's funding rate for a market at `markPriceE30`. */
	nextFundingRate(marketIndex: number, markPriceE30: bigint): bigint {
		const config = this.config.market(marketIndex);
		if (!config || config.maxSkewScaleUsdE30 === 0n) return 0n;
		const state = this.positions.marketState(marketIndex);

		const skewUsd = mulDiv(state.longOpenInterest - state.shortOpenInterest, markPriceE30, E30);
		const ratio = clamp(
			mulDiv(skewUsd, RATE_PRECISION, config.maxSkewScaleUsdE30),
			-RATE_PRECISION,
			RATE_PRECISION,
		);
		return -mulDiv(ratio, config.maxFundingRate, RATE_PRECISION);
	}
}

/**
 * Splits an interval's funding rate between the sides. The paying side
 * accrues the full rate; the receiving side accrues it scaled by
 * min(1, paying size / receiving size), and nothing if either side is empty.
 */
export function splitFundingRate(rate: bigint, state: GlobalMarketState): FundingSplit {
	if (rate === 0n) return { longDelta: 0n, shortDelta: 0n };
	const longsReceive = rate > 0n;
	const payingSize = longsReceive ? state.shortPositionSize : state.longPositionSize;
	const receivingSize = longsReceive ? state.longPositionSize : state.shortPositionSize;

	let received = 0n;
	if (payingSize > 0n && receivingSize > 0n) {
		const magnitude = mulDiv(abs(rate), min(payingSize, receivingSize), receivingSize);
		received = longsReceive ? magnitude : -magnitude;
	}
	return longsReceive
		? { longDelta: received, shortDelta: rate }
		: { longDelta: rate, shortDelta: received };
}
