import { describe, expect, it } from "vitest";
import { ETH, USDC, WETH, createHarness } from "../__tests__/harness.js";
import { rate, usd } from "../shared/fixed-point.js";
import { EMPTY_ASSET_CLASS_STATE, EMPTY_MARKET_STATE } from "../storage/types.js";
import { splitFundingRate } from "./rate-calculator.js";

function pooled() {
	const h = createHarness();
	h.fundPool("liquidity", USDC, "1000000");
	h.fundPool("liquidity", WETH, "100");
	return h;
}

describe("RateCalculator", () => {
	describe("poolTvlE30", () => {
		it("values pool liquidity at min prices", () => {
			const h = pooled();
			expect(h.rates.poolTvlE30()).toEqual({ ok: true, value: usd("1200000") });
		});

		it("substitutes the override price for its asset", () => {
			const h = pooled();
			const tvl = h.rates.poolTvlE30({ asset: ETH, priceE30: usd("1500") });
			expect(tvl).toEqual({ ok: true, value: usd("1150000") });
		});

		it("propagates oracle failures", () => {
			const h = pooled();
			h.source.setMarketStatus(ETH, "inactive");
			const tvl = h.rates.poolTvlE30();
			expect(!tvl.ok && tvl.error.code).toBe("MarketClosed");
		});
	});

	describe("nextBorrowingRate", () => {
		it("scales the base rate by reserve utilization", () => {
			const h = pooled();
			h.positions.saveAssetClassState(h.writer, 0, {
				...EMPTY_ASSET_CLASS_STATE,
				reserveValueE30: usd("120000"),
			});
			// 0.0001 × 120 000 / 1 200 000
			expect(h.rates.nextBorrowingRate(0)).toEqual({ ok: true, value: rate("0.00001") });
		});

		it("is zero on an empty pool", () => {
			const h = createHarness();
			h.positions.saveAssetClassState(h.writer, 0, {
				...EMPTY_ASSET_CLASS_STATE,
				reserveValueE30: usd("120000"),
			});
			expect(h.rates.nextBorrowingRate(0)).toEqual({ ok: true, value: 0n });
		});

		it("is zero with nothing reserved", () => {
			const h = pooled();
			expect(h.rates.nextBorrowingRate(0)).toEqual({ ok: true, value: 0n });
		});
	});

	describe("nextFundingRate", () => {
		it("charges longs under a long skew", () => {
			const h = createHarness();
			h.positions.saveMarketState(h.writer, 0, {
				...EMPTY_MARKET_STATE,
				longOpenInterest: usd("500"),
			});
			// skew $1M / scale $10M = 0.1 -> -0.1 × 0.0004
			expect(h.rates.nextFundingRate(0, usd("2000"))).toBe(rate("-0.00004"));
			expect(h.rates.nextFundingRate(0, usd("4000"))).toBe(rate("-0.00008"));
		});

		it("pays longs under a short skew", () => {
			const h = createHarness();
			h.positions.saveMarketState(h.writer, 0, {
				...EMPTY_MARKET_STATE,
				shortOpenInterest: usd("500"),
			});
			expect(h.rates.nextFundingRate(0, usd("2000"))).toBe(rate("0.00004"));
		});

		it("clamps at the max funding rate", () => {
			const h = createHarness();
			h.positions.saveMarketState(h.writer, 0, {
				...EMPTY_MARKET_STATE,
				longOpenInterest: usd("10000"),
			});
			expect(h.rates.nextFundingRate(0, usd("2000"))).toBe(rate("-0.0004"));
		});

		it("is zero for an unknown market", () => {
			const h = createHarness();
			expect(h.rates.nextFundingRate(9, usd("2000"))).toBe(0n);
		});
	});
});

describe("splitFundingRate", () => {
	const state = {
		...EMPTY_MARKET_STATE,
		longPositionSize: usd("1000"),
		shortPositionSize: usd("500"),
	};

	it("scales the receiving longs by the paying shorts' relative size", () => {
		expect(splitFundingRate(100n, state)).toEqual({ longDelta: 50n, shortDelta: 100n });
	});

	it("caps the receiving side at the full rate", () => {
		expect(splitFundingRate(-100n, state)).toEqual({ longDelta: -100n, shortDelta: -100n });
	});

	it("gives the receiving side nothing when the paying side is empty", () => {
		const longsOnly = { ...EMPTY_MARKET_STATE, longPositionSize: usd("1000") };
		expect(splitFundingRate(100n, longsOnly)).toEqual({ longDelta: 0n, shortDelta: 100n });
	});

	it("a zero rate moves nothing", () => {
		expect(splitFundingRate(0n, state)).toEqual({ longDelta: 0n, shortDelta: 0n });
	});
});
