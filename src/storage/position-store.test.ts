import { describe, expect, it } from "vitest";
import { Allowlist } from "../auth/access-control.js";
import { issueCredential } from "../auth/credentials.js";
import { isAuthorizationError } from "../shared/errors.js";
import { MAX_INT256, usd } from "../shared/fixed-point.js";
import { positionIdOf, primaryAccount, subAccountOf } from "../shared/identifiers.js";
import { PositionStore, positionIdFor } from "./position-store.js";
import { EMPTY_MARKET_STATE, type Position } from "./types.js";
import { UndoLog } from "./undo-log.js";

const ALICE = primaryAccount("0x00000000000000000000000000000000000a11ce");
const ALICE_0 = subAccountOf(ALICE, 0);
const ALICE_1 = subAccountOf(ALICE, 1);

function position(overrides: Partial<Position> = {}): Position {
	return {
		primaryAccount: ALICE,
		subAccountId: 0,
		marketIndex: 0,
		positionSizeE30: usd("1000"),
		avgEntryPriceE30: usd("2000"),
		entryBorrowingRate: 0n,
		entryFundingRate: 0n,
		reserveValueE30: usd("900"),
		lastIncreaseTimestamp: 1_000,
		realizedPnlE30: 0n,
		openInterest: usd("0.5"),
		...overrides,
	};
}

function setup() {
	const owner = issueCredential("owner");
	const writer = issueCredential("settlement");
	const allowlist = new Allowlist(owner);
	allowlist.allow(owner, writer);
	const undo = new UndoLog();
	const store = new PositionStore(allowlist, undo);
	return { writer, undo, store };
}

describe("PositionStore", () => {
	it("derives position ids from sub-account and market", () => {
		expect(positionIdFor(position())).toBe(positionIdOf(ALICE_0, 0));
		expect(positionIdFor(position({ subAccountId: 1 }))).toBe(positionIdOf(ALICE_1, 0));
		expect(positionIdOf(ALICE_0, 0)).not.toBe(positionIdOf(ALICE_0, 1));
	});

	describe("lifecycle", () => {
		it("Absent -> Open registers every index", () => {
			const { writer, store } = setup();
			store.savePosition(writer, position());

			expect(store.positionOf(ALICE_0, 0)?.positionSizeE30).toBe(usd("1000"));
			expect(store.positionsOf(ALICE_0)).toHaveLength(1);
			expect(store.activePositionIds()).toEqual([positionIdOf(ALICE_0, 0)]);
			expect(store.activeSubAccounts()).toEqual([ALICE_0]);
		});

		it("Open -> Open updates in place", () => {
			const { writer, store } = setup();
			store.savePosition(writer, position());
			store.savePosition(writer, position({ positionSizeE30: usd("1500") }));

			expect(store.positionOf(ALICE_0, 0)?.positionSizeE30).toBe(usd("1500"));
			expect(store.activePositionIds()).toHaveLength(1);
		});

		it("Open -> Absent keeps the account active while another position remains", () => {
			const { writer, store } = setup();
			store.savePosition(writer, position());
			store.savePosition(writer, position({ marketIndex: 1 }));
			store.savePosition(writer, position({ positionSizeE30: 0n }));

			expect(store.positionOf(ALICE_0, 0)).toBeUndefined();
			expect(store.positionsOf(ALICE_0).map((p) => p.marketIndex)).toEqual([1]);
			expect(store.isActiveAccount(ALICE_0)).toBe(true);
		});

		it("closing the last position removes the account", () => {
			const { writer, store } = setup();
			store.savePosition(writer, position({ positionSizeE30: usd("-10") }));
			store.savePosition(writer, position({ positionSizeE30: 0n }));

			expect(store.activePositionIds()).toEqual([]);
			expect(store.activeSubAccounts()).toEqual([]);
			expect(store.positionsOf(ALICE_0)).toEqual([]);
		});

		it("saving size zero for an absent position is a no-op", () => {
			const { writer, store } = setup();
			store.savePosition(writer, position({ positionSizeE30: 0n }));
			expect(store.activeSubAccounts()).toEqual([]);
		});
	});

	describe("global state", () => {
		it("defaults to empty accumulators", () => {
			const { store } = setup();
			expect(store.marketState(7)).toEqual(EMPTY_MARKET_STATE);
			expect(store.assetClassState(0).lastBorrowingTime).toBe(0);
		});

		it("saves market and asset class state", () => {
			const { writer, store } = setup();
			store.saveMarketState(writer, 0, { ...EMPTY_MARKET_STATE, accumFundingLong: -5n });
			store.saveAssetClassState(writer, 0, {
				sumBorrowingRate: 3n,
				reserveValueE30: 0n,
				lastBorrowingTime: 3_600,
			});

			expect(store.marketState(0).accumFundingLong).toBe(-5n);
			expect(store.assetClassState(0).sumBorrowingRate).toBe(3n);
		});

		it("rejects values outside int256", () => {
			const { writer, store } = setup();
			expect(() =>
				store.saveMarketState(writer, 0, { ...EMPTY_MARKET_STATE, accumFundingLong: MAX_INT256 + 1n }),
			).toThrow("accumFundingLong outside int256 range");
		});
	});

	it("rejects callers that are not whitelisted", () => {
		const { store } = setup();
		const stranger = issueCredential("stranger");
		let code: string | undefined;
		try {
			store.savePosition(stranger, position());
		} catch (e) {
			if (isAuthorizationError(e)) code = e.code;
		}
		expect(code).toBe("NotWhitelisted");
		expect(store.activePositionIds()).toEqual([]);
	});

	it("rolls back a close, restoring every index", () => {
		const { writer, undo, store } = setup();
		store.savePosition(writer, position());

		undo.begin();
		store.savePosition(writer, position({ positionSizeE30: 0n }));
		expect(store.isActiveAccount(ALICE_0)).toBe(false);
		undo.rollback();

		expect(store.positionOf(ALICE_0, 0)?.positionSizeE30).toBe(usd("1000"));
		expect(store.positionsOf(ALICE_0)).toHaveLength(1);
		expect(store.activePositionIds()).toEqual([positionIdOf(ALICE_0, 0)]);
		expect(store.isActiveAccount(ALICE_0)).toBe(true);
	});

	it("rolls back an open, leaving the position absent", () => {
		const { writer, undo, store } = setup();
		undo.begin();
		store.savePosition(writer, position());
		undo.rollback();

		expect(store.positionOf(ALICE_0, 0)).toBeUndefined();
		expect(store.activeSubAccounts()).toEqual([]);
	});
});
