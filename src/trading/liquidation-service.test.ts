import { describe, expect, it, vi } from "vitest";
import { ALICE, ALICE_SUB, BOB_SUB, BTC, ETH, USDC, createHarness } from "../__tests__/harness.js";
import { usd } from "../shared/fixed-point.js";

/** $10k ETH long on 150 USDC: 140 left after the fee, MMR $50. */
function underwaterSetup() {
	const h = createHarness();
	h.deposit(ALICE_SUB, USDC, "150");
	const opened = h.trade.increasePosition(h.writer, {
		primaryAccount: ALICE,
		subAccountId: 0,
		marketIndex: 0,
		sizeDeltaE30: usd("10000"),
	});
	if (!opened.ok) throw opened.error;
	return h;
}

describe("LiquidationService", () => {
	it("rejects an account whose equity covers maintenance margin", () => {
		const h = underwaterSetup();
		// −$50 unrealized: equity 90 against MMR 50
		h.setPrice(ETH, "1990");

		const result = h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		expect(!result.ok && result.error.code).toBe("AccountHealthy");
		expect(h.positions.positionOf(ALICE_SUB, 0)?.positionSizeE30).toBe(usd("10000"));
	});

	it("rejects an account without positions", () => {
		const h = createHarness();
		h.deposit(ALICE_SUB, USDC, "10");

		const result = h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		expect(!result.ok && result.error.code).toBe("AccountHealthy");
	});

	it("settles the loss and pays the liquidator when collateral suffices", () => {
		const h = underwaterSetup();
		// −$100 unrealized: equity 40 against MMR 50
		h.setPrice(ETH, "1980");

		const result = h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		expect(result).toEqual({
			ok: true,
			value: {
				subAccount: ALICE_SUB,
				liquidator: BOB_SUB,
				equityE30: usd("40"),
				maintenanceMarginRequiredE30: usd("50"),
				positions: [
					{
						marketIndex: 0,
						sizeE30: usd("10000"),
						borrowingFeeE30: 0n,
						fundingFeeE30: 0n,
						realizedPnlE30: -usd("100"),
					},
				],
				liquidationFeeE30: usd("5"),
				badDebtE30: 0n,
			},
		});
		expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(h.amount(USDC, "35"));
		expect(h.ledger.traderBalance(BOB_SUB, USDC)).toBe(h.amount(USDC, "5"));
		expect(h.ledger.poolLiquidity(USDC)).toBe(h.amount(USDC, "100"));
		expect(h.ledger.badDebtUsd(ALICE_SUB)).toBe(0n);
	});

	it("records what the basket cannot cover as bad debt", () => {
		const h = underwaterSetup();
		h.setPrice(ETH, "1900");

		const result = h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		// $500 loss on 140 USDC, then a $5 fee with nothing left
		expect(result.ok && result.value.badDebtE30).toBe(usd("365"));
		expect(result.ok && result.value.liquidationFeeE30).toBe(0n);
		expect(result.ok && result.value.equityE30).toBe(-usd("360"));
		expect(h.ledger.badDebtUsd(ALICE_SUB)).toBe(usd("365"));
		expect(h.ledger.traderTokens(ALICE_SUB)).toEqual([]);
		expect(h.ledger.poolLiquidity(USDC)).toBe(h.amount(USDC, "140"));
		expect(h.ledger.traderBalance(BOB_SUB, USDC)).toBe(0n);
	});

	it("closes every position and clears the account from the indexes", () => {
		const h = underwaterSetup();
		h.deposit(ALICE_SUB, USDC, "100");
		h.trade.increasePosition(h.writer, {
			primaryAccount: ALICE,
			subAccountId: 0,
			marketIndex: 1,
			sizeDeltaE30: -usd("3000"),
		});
		h.setPrice(ETH, "1900");

		const result = h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		expect(result.ok && result.value.positions.map((p) => p.marketIndex)).toEqual([0, 1]);
		expect(h.positions.positionsOf(ALICE_SUB)).toEqual([]);
		expect(h.positions.isActiveAccount(ALICE_SUB)).toBe(false);
		expect(h.positions.marketState(0).longPositionSize).toBe(0n);
		expect(h.positions.marketState(1).shortPositionSize).toBe(0n);
		expect(h.positions.assetClassState(0).reserveValueE30).toBe(0n);
	});

	it("nets a profitable position against a losing one before booking bad debt", () => {
		const h = createHarness();
		h.fundPool("liquidity", USDC, "1000");
		h.deposit(ALICE_SUB, USDC, "250");
		for (const [marketIndex, size] of [
			[0, usd("10000")],
			[1, -usd("3000")],
		] as const) {
			const opened = h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex,
				sizeDeltaE30: size,
			});
			if (!opened.ok) throw opened.error;
		}
		// 237 USDC after open fees; ETH long −$500, BTC short +$100
		h.setPrice(ETH, "1900");
		h.setPrice(BTC, "29000");

		const result = h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		expect(result.ok && result.value.equityE30).toBe(-usd("163"));
		expect(result.ok && result.value.positions.map((p) => p.realizedPnlE30)).toEqual([
			-usd("500"),
			usd("100"),
		]);
		// 237 + 100 profit − 500 loss, then the $5 fee with nothing left
		expect(result.ok && result.value.badDebtE30).toBe(usd("168"));
		expect(h.ledger.badDebtUsd(ALICE_SUB)).toBe(usd("168"));
		expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(0n);
		expect(h.ledger.traderBalance(BOB_SUB, USDC)).toBe(0n);
		expect(h.ledger.poolLiquidity(USDC)).toBe(h.amount(USDC, "1237"));
	});

	it("emits accountLiquidated only on success", () => {
		const h = underwaterSetup();
		const listener = vi.fn();
		h.events.on("accountLiquidated", listener);

		h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);
		h.setPrice(ETH, "1980");
		h.liquidation.liquidate(h.writer, ALICE_SUB, BOB_SUB);

		expect(listener).toHaveBeenCalledTimes(1);
	});
});
