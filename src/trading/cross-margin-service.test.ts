import { describe, expect, it, vi } from "vitest";
import { ALICE, ALICE_SUB, USDC, WETH, createHarness } from "../__tests__/harness.js";
import { usd } from "../shared/fixed-point.js";
import { tokenAddress } from "../shared/identifiers.js";

function request(token = USDC, amount = 100_000_000n) {
	return { primaryAccount: ALICE, subAccountId: 0, token, amount };
}

describe("CrossMarginService", () => {
	describe("depositCollateral", () => {
		it("credits the sub-account and emits the movement", () => {
			const h = createHarness();
			const listener = vi.fn();
			h.events.on("collateralDeposited", listener);

			const result = h.crossMargin.depositCollateral(h.writer, request());

			const movement = {
				subAccount: ALICE_SUB,
				token: USDC,
				amount: 100_000_000n,
				balance: 100_000_000n,
			};
			expect(result).toEqual({ ok: true, value: movement });
			expect(h.ledger.traderTokens(ALICE_SUB)).toEqual([USDC]);
			expect(listener).toHaveBeenCalledWith(movement);
		});

		it("rejects tokens that are unknown or no longer accepted", () => {
			const h = createHarness();
			const weth = h.config.collateralToken(WETH);
			if (!weth) throw new Error("WETH missing");
			h.config.setCollateralToken(h.owner, { ...weth, accepted: false });

			const closed = h.crossMargin.depositCollateral(h.writer, request(WETH, 1n));
			const unknown = h.crossMargin.depositCollateral(
				h.writer,
				request(tokenAddress("0x4000000000000000000000000000000000000004"), 1n),
			);

			expect(!closed.ok && closed.error.code).toBe("TokenNotAccepted");
			expect(!unknown.ok && unknown.error.code).toBe("TokenNotAccepted");
			expect(h.ledger.traderTokens(ALICE_SUB)).toEqual([]);
		});

		it("rejects a zero amount", () => {
			const h = createHarness();
			const result = h.crossMargin.depositCollateral(h.writer, request(USDC, 0n));
			expect(!result.ok && result.error.code).toBe("InvalidCollateralAmount");
		});
	});

	describe("withdrawCollateral", () => {
		it("debits a free balance", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "100");

			const result = h.crossMargin.withdrawCollateral(h.writer, request(USDC, 40_000_000n));

			expect(result.ok && result.value.balance).toBe(60_000_000n);
		});

		it("deregisters the token when the balance reaches zero", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "100");

			h.crossMargin.withdrawCollateral(h.writer, request());

			expect(h.ledger.hasTraderToken(ALICE_SUB, USDC)).toBe(false);
		});

		it("rejects a withdrawal larger than the balance", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "10");

			const result = h.crossMargin.withdrawCollateral(h.writer, request());

			expect(!result.ok && result.error.code).toBe("InsufficientCollateralBalance");
			expect(h.ledger.traderBalance(ALICE_SUB, USDC)).toBe(10_000_000n);
		});

		it("keeps equity at or above IMR and leaves the balance unchanged on failure", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, USDC, "150");
			h.trade.increasePosition(h.writer, {
				primaryAccount: ALICE,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: usd("10000"),
			});
			const listener = vi.fn();
			h.events.on("collateralWithdrawn", listener);

			// 140 USDC left against a $100 IMR
			const tooMuch = h.crossMargin.withdrawCollateral(h.writer, request(USDC, 50_000_000n));
			const exact = h.crossMargin.withdrawCollateral(h.writer, request(USDC, 40_000_000n));

			expect(!tooMuch.ok && tooMuch.error.code).toBe("WithdrawBalanceBelowIMR");
			expect(exact.ok && exact.value.balance).toBe(100_000_000n);
			expect(listener).toHaveBeenCalledTimes(1);
		});

		it("lets a trader withdraw a token that is no longer accepted", () => {
			const h = createHarness();
			h.deposit(ALICE_SUB, WETH, "1");
			const weth = h.config.collateralToken(WETH);
			if (!weth) throw new Error("WETH missing");
			h.config.setCollateralToken(h.owner, { ...weth, accepted: false });

			const result = h.crossMargin.withdrawCollateral(h.writer, request(WETH, h.amount(WETH, "1")));

			expect(result.ok && result.value.balance).toBe(0n);
		});
	});
});
