import type { AssetId } from "../shared/identifiers.js";

/** Trading status reported by the feed for an asset. */
export type MarketStatus = "undefined" | "inactive" | "active";

/** Raw feed entry. `publishTime` is unix seconds. */
export interface PriceRecord {
	readonly priceE30: bigint;
	readonly confidenceE30: bigint;
	readonly publishTime: number;
}

/** Pluggable feed behind the gateway. */
export interface PriceSource {
	read(asset: AssetId): PriceRecord | undefined;
	marketStatus(asset: AssetId): MarketStatus;
}

/** A price accepted by the gateway, with the time it was published. */
export interface PriceQuote {
	readonly priceE30: bigint;
	readonly lastUpdateTime: number;
}

/** Inputs to an adaptive (skew-aware) price adjustment. All USD E30. */
export interface AdaptivePriceInput {
	readonly priceE30: bigint;
	readonly skewE30: bigint;
	readonly sizeDeltaE30: bigint;
	readonly maxSkewScaleE30: bigint;
}

/** Turns an oracle price into the execution price for a trade of a given size. */
export interface AdaptivePricer {
	adjust(input: AdaptivePriceInput): bigint;
}
