import type { AssetId } from "../shared/identifiers.js";
import type { MarketStatus, PriceRecord, PriceSource } from "./types.js";

/** In-process feed; prices are pushed in by whoever owns the instance. */
export class InMemoryPriceSource implements PriceSource {
	private readonly prices = new Map<AssetId, PriceRecord>();
	private readonly statuses = new Map<AssetId, MarketStatus>();

	/** Publishes a price. Marks the market active unless a status was set before. */
	setPrice(asset: AssetId, priceE30: bigint, publishTime: number, confidenceE30 = 0n): void {
		this.prices.set(asset, { priceE30, confidenceE30, publishTime });
		if (!this.statuses.has(asset)) this.statuses.set(asset, "active");
	}

	setMarketStatus(asset: AssetId, status: MarketStatus): void {
		this.statuses.set(asset, status);
	}

	read(asset: AssetId): PriceRecord | undefined {
		return this.prices.get(asset);
	}

	marketStatus(asset: AssetId): MarketStatus {
		return this.statuses.get(asset) ?? "undefined";
	}
}
