import { describe, expect, it, vi } from "vitest";
import {
	ALICE,
	ALICE_SUB,
	ETH,
	HOUR,
	type Harness,
	T0,
	USDC,
	createHarness,
} from "../__tests__/harness.js";
import { issueCredential } from "../auth/credentials.js";
import { AuthorizationError } from "../shared/errors.js";
import { usd } from "../shared/fixed-point.js";
import { EMPTY_MARKET_STATE } from "../storage/types.js";

function open(sizeUsd: string, collateralUsdc = "1000") {
	const h = createHarness();
	h.fundPool("liquidity", USDC, "100000");
	h.deposit(ALICE_SUB, USDC, collateralUsdc);
	const opened = h.trade.increasePosition(h.writer, {
		primaryAccount: ALICE,
		subAccountId: 0,
		marketIndex: 0,
		sizeDeltaE30: usd(sizeUsd),
	});
	return { h, opened };
}

function decrease(h: Harness, sizeUsd: string) {
	return h.trade.decreasePosition(h.writer, {
		primaryAccount: ALICE,
		subAccountId: 0,
		marketIndex: 0,
		sizeToDecreaseE30: usd(sizeUsd),
	});
}

describe("TradeService", () => {
	describe("increasePosition", () => {
		it("opens a long at the oracle price and charges the trading fee", () => {
			const { h, opened } = open("10000");

			expect(opened.ok).toBe(true);
			const position = h.positions.positionOf(ALICE_SUB, 0);
			expect(position?.positionSizeE30).toBe(usd("10000"));
			expect(position?.avgEntryPriceE30).toBe(usd("2000"));
			expect(position?.openInterest).toBe(usd("5"));
			expect(position?.reserveValueE30).toBe(usd("900"));
			expect(position?.lastIncreaseTimestamp).toBe(T0);
			// $10 fee: 1.5 to dev, 8.5 to protocol
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "990"));
			expect(h.ledger.devFees(USDC)).toBe(h.amount(USDC, "1.5"));
			expect(h.ledger.protocolFees(USDC)).toBe(h.amount(USDC, "8.5"));
		});

		it("moves the market and asset class totals", () => {
			const { h } = open("10000");

			const market = h.positions.marketState(0);
			expect(market.longPositionSize).toBe(usd("10000"));
			expect(market.longOpenInterest).toBe(usd("5"));
			expect(market.longAvgPrice).toBe(usd("2000"));
			expect(market.lastFundingTime).toBe(T0);
			expect(h.positions.assetClassState(0).reserveValueE30).toBe(usd("900"));
		});

		it("reports the account's health after the change", () => {
			const { opened } = open("10000");

			expect(opened.ok && opened.value.health.equityE30).toBe(usd("990"));
			expect(opened.ok && opened.value.health.initialMarginRequiredE30).toBe(usd("100"));
			expect(opened.ok && opened.value.health.freeCollateralE30).toBe(usd("890"));
		});

		it("averages entry prices by open interest", () => {
			const { h } = open("10000");
			h.setPrice(ETH, "2500");

			const result = h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: usd("10000"),
			});

			expect(result.ok).toBe(true);
			const position = h.positions.positionOf(ALICE_SUB, 0);
			// 5 ETH at 2000 plus 4 ETH at 2500
			expect(position?.openInterest).toBe(usd("9"));
			expect(position?.avgEntryPriceE30).toBe(2_222_222_222_222_222_222_222_222_222_222_222n);
		});

		it("opens a short on a negative delta", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "1000");

			h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: -usd("10000"),
			});

			expect(h.positions.positionOf(ALICE_SUB, 0)?.positionSizeE30).toBe(-usd("10000"));
			expect(h.positions.marketState(0).shortPositionSize).toBe(usd("10000"));
			expect(h.positions.marketState(0).shortAvgPrice).toBe(usd("2000"));
		});

		it("rolls everything back when free collateral would go negative", () => {
			const { h, opened } = open("10000", "50");

			expect(!opened.ok && opened.error.code).toBe("InsufficientFreeCollateral");
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "50"));
			expect(h.ledger.protocolFees(USDC)).toBe(0n);
			expect(h.positions.positionOf(ALICE_SUB, 0)).toBeUndefined();
			expect(h.positions.isActiveAccount(ALICE_SUB)).toBe(false);
			expect(h.positions.marketState(0)).toEqual(EMPTY_MARKET_STATE);
		});

		it("rejects a zero delta and an increase against the open side", () => {
			const { h } = open("10000");
			const request = { primaryAccount: ALICE, subAccountId: 0, marketIndex: 0 };

			const zero = h.trade.increasePosition(h.writer, { ...request, sizeDeltaE30: 0n });
			const flip = h.trade.increasePosition(h.writer, { ...request, sizeDeltaE30: -usd("1000") });

			expect(!zero.ok && zero.error.code).toBe("InvalidSizeDelta");
			expect(!flip.ok && flip.error.code).toBe("InvalidSizeDelta");
			expect(h.positions.positionOf(ALICE_SUB, 0)?.positionSizeE30).toBe(usd("10000"));
		});

		it("rejects unknown and inactive markets", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "1000");
			const market = h.config.market(1);
			if (!market) throw new Error("market 1 missing");
			h.config.setMarketConfig(h.owner, { ...market, active: false });
			const request = { primaryAccount: ALICE, subAccountId: 0, sizeDeltaE30: usd("1000") };

			const unknown = h.trade.increasePosition(h.writer, { ...request, marketIndex: 9 });
			const inactive = h.trade.increasePosition(h.writer, { ...request, marketIndex: 1 });

			expect(!unknown.ok && unknown.error.code).toBe("MarketNotFound");
			expect(!inactive.ok && inactive.error.code).toBe("MarketInactive");
		});

		it("throws for a caller that is not allowed", () => {
			const h = createHarness();
			const stranger = issueCredential("stranger");

			expect(() =>
				h.trade.increasePosition(stranger, {
					primaryAccount: ALICE,
					subAccountId: 0,
					marketIndex: 0,
					sizeDeltaE30: usd("1000"),
				}),
			).toThrow(AuthorizationError);
		});
	});

	describe("decreasePosition", () => {
		it("realizes a proportional profit from pool liquidity", () => {
			const { h } = open("10000");
			h.setPrice(ETH, "2200");

			const result = decrease(h, "5000");

			expect(result.ok && result.value.realizedPnlE30).toBe(usd("500"));
			expect(result.ok && result.value.fillPriceE30).toBe(usd("2200"));
			// 1000 − 10 open fee − 5 close fee + 500 profit
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "1485"));
			expect(h.ledger.poolLiquidity(USDC)).toBe(h.amount(USDC, "99500"));

			const position = h.positions.positionOf(ALICE_SUB, 0);
			expect(position?.positionSizeE30).toBe(usd("5000"));
			expect(position?.avgEntryPriceE30).toBe(usd("2000"));
			expect(position?.openInterest).toBe(usd("2.5"));
			expect(position?.reserveValueE30).toBe(usd("450"));
			expect(position?.realizedPnlE30).toBe(usd("500"));
			expect(h.positions.assetClassState(0).reserveValueE30).toBe(usd("450"));
		});

		it("closes the position at a loss and clears every index", () => {
			const { h } = open("10000");
			h.setPrice(ETH, "1900");

			const result = decrease(h, "10000");

			expect(result.ok && result.value.sizeE30).toBe(0n);
			expect(result.ok && result.value.realizedPnlE30).toBe(-usd("500"));
			// 1000 − 10 − 10 − 500
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "480"));
			expect(h.ledger.poolLiquidity(USDC)).toBe(h.amount(USDC, "100500"));
			expect(h.positions.positionOf(ALICE_SUB, 0)).toBeUndefined();
			expect(h.positions.activePositionIds()).toEqual([]);
			expect(h.positions.isActiveAccount(ALICE_SUB)).toBe(false);

			const market = h.positions.marketState(0);
			expect(market.longPositionSize).toBe(0n);
			expect(market.longOpenInterest).toBe(0n);
			expect(market.longAvgPrice).toBe(0n);
			expect(h.positions.assetClassState(0).reserveValueE30).toBe(0n);
		});

		it("closes a short in profit at the max price", () => {
			const h = createHarness();
			h.fundPool("liquidity", USDC, "100000");
			h.deposit(ALICE_SUB, USDC, "1000");
			h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: -usd("10000"),
			});
			h.setPrice(ETH, "1800");

			const result = decrease(h, "10000");

			expect(result.ok && result.value.realizedPnlE30).toBe(usd("1000"));
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "1980"));
			expect(h.positions.marketState(0).shortPositionSize).toBe(0n);
		});

		it("settles borrowing and funding accrued since the entry snapshots", () => {
			const { h } = open("10000");
			h.advance(HOUR);

			const result = decrease(h, "10000");

			expect(result.ok).toBe(true);
			if (!result.ok) return;
			// borrowing: 0.0001 × 900 / 100 000 per interval on a $900 reserve
			expect(result.value.fees.borrowingFeeE30).toBe(usd("0.00081"));
			// funding: $10k long skew on a $10M scale, longs pay 0.00004%
			expect(result.value.fees.fundingFeeE30).toBe(-usd("0.004"));
			expect(result.value.fees.fundingPayer).toBe("trader");
			expect(h.ledger.fundingFeeReserve(USDC)).toBe(4_000n);
			// 810 units: 121 to dev, 689 back to liquidity
			expect(h.ledger.poolLiquidity(USDC)).toBe(h.amount(USDC, "100000") + 689n);
		});

		it("rejects a missing position, an oversized decrease and a zero size", () => {
			const { h } = open("10000");

			const tooLarge = decrease(h, "10001");
			const zero = decrease(h, "0");
			const missing = h.trade.decreasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 1,
				marketIndex: 0,
				sizeToDecreaseE30: usd("1"),
			});

			expect(!tooLarge.ok && tooLarge.error.code).toBe("DecreaseTooLarge");
			expect(!zero.ok && zero.error.code).toBe("InvalidSizeDelta");
			expect(!missing.ok && missing.error.code).toBe("PositionNotFound");
		});

		it("rejects a partial decrease that leaves the rest below IMR", () => {
			const { h } = open("10000", "150");
			h.setPrice(ETH, "1950");

			// loses $125 on the closed half and keeps $125 unrealized on the rest
			const result = decrease(h, "5000");

			expect(!result.ok && result.error.code).toBe("DecreaseBelowIMR");
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "140"));
			expect(h.positions.positionOf(ALICE_SUB, 0)?.positionSizeE30).toBe(usd("10000"));
		});
	});

	describe("events", () => {
		it("emits after a committed change, fees first", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "1000");
			const seen: string[] = [];
			h.events.on("feesSettled", (receipt) => seen.push(`fees:${receipt.tradingFeeE30}`));
			h.events.on("positionChanged", (change) => seen.push(`position:${change.sizeE30}`));

			h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: usd("10000"),
			});

			expect(seen).toEqual([`fees:${usd("10")}`, `position:${usd("10000")}`]);
		});

		it("emits nothing for a rolled-back change", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "50");
			const listener = vi.fn();
			h.events.on("positionChanged", listener);

			h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: usd("10000"),
			});

			expect(listener).not.toHaveBeenCalled();
		});
	});
});
