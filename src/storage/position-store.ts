/**
 * PositionStore — positions, global market/asset-class accumulators, and
 * the indexes used to enumerate them.
 *
 * A position moves Absent → Open → Open(mutated) → Absent. Saving a
 * position with size zero deletes it and drops it from every index; the
 * sub-account leaves the active-account set with its last position.
 */

import type { Authorizer, CallerCredential } from "../auth/types.js";
import { checkedInt256, checkedUint256 } from "../shared/fixed-point.js";
import {
	type PositionId,
	type SubAccount,
	positionIdOf,
	subAccountOf,
} from "../shared/identifiers.js";
import {
	EMPTY_ASSET_CLASS_STATE,
	EMPTY_MARKET_STATE,
	type GlobalAssetClassState,
	type GlobalMarketState,
	type Position,
} from "./types.js";
import type { UndoLog } from "./undo-log.js";

/** Sub-account a position belongs to. */
export function positionSubAccount(position: Position): SubAccount {
	return subAccountOf(position.primaryAccount, position.subAccountId);
}

export function positionIdFor(position: Position): PositionId {
	return positionIdOf(positionSubAccount(position), position.marketIndex);
}

export class PositionStore {
	private readonly authorizer: Authorizer;
	private readonly undo: UndoLog;

	private readonly positions = new Map<PositionId, Position>();
	private readonly subAccountPositions = new Map<SubAccount, Set<PositionId>>();
	private readonly activePositions = new Set<PositionId>();
	private readonly activeAccounts = new Set<SubAccount>();
	private readonly markets = new Map<number, GlobalMarketState>();
	private readonly assetClasses = new Map<number, GlobalAssetClassState>();

	constructor(authorizer: Authorizer, undo: UndoLog) {
		this.authorizer = authorizer;
		this.undo = undo;
	}

	// ── Reads ──────────────────────────────────────────────────────

	getPosition(id: PositionId): Position | undefined {
		return this.positions.get(id);
	}

	positionOf(subAccount: SubAccount, marketIndex: number): Position | undefined {
		return this.positions.get(positionIdOf(subAccount, marketIndex));
	}

	/** Open positions of a sub-account, in the order they were opened. */
	positionsOf(subAccount: SubAccount): readonly Position[] {
		const ids = this.subAccountPositions.get(subAccount);
		if (!ids) return [];
		const out: Position[] = [];
		for (const id of ids) {
			const position = this.positions.get(id);
			if (position) out.push(position);
		}
		return out;
	}

	activePositionIds(): readonly PositionId[] {
		return [...this.activePositions];
	}

	activeSubAccounts(): readonly SubAccount[] {
		return [...this.activeAccounts];
	}

	isActiveAccount(subAccount: SubAccount): boolean {
		return this.activeAccounts.has(subAccount);
	}

	marketState(marketIndex: number): GlobalMarketState {
		return this.markets.get(marketIndex) ?? EMPTY_MARKET_STATE;
	}

	assetClassState(assetClass: number): GlobalAssetClassState {
		return this.assetClasses.get(assetClass) ?? EMPTY_ASSET_CLASS_STATE;
	}

	// ── Mutators ───────────────────────────────────────────────────

	/** Creates, updates or (at size zero) deletes a position. */
	savePosition(caller: CallerCredential, position: Position): void {
		this.authorizer.assertAuthorized(caller, "savePosition");
		const subAccount = positionSubAccount(position);
		const id = positionIdOf(subAccount, position.marketIndex);

		if (position.positionSizeE30 === 0n) {
			this.remove(id, subAccount);
			return;
		}

		checkPosition(position);
		this.undo.setEntry(this.positions, id, position);

		let ids = this.subAccountPositions.get(subAccount);
		if (!ids) {
			ids = new Set();
			this.undo.setEntry(this.subAccountPositions, subAccount, ids);
		}
		this.undo.addMember(ids, id);
		this.undo.addMember(this.activePositions, id);
		this.undo.addMember(this.activeAccounts, subAccount);
	}

	saveMarketState(caller: CallerCredential, marketIndex: number, state: GlobalMarketState): void {
		this.authorizer.assertAuthorized(caller, "saveMarketState");
		checkUint(state.longPositionSize, "longPositionSize");
		checkUint(state.shortPositionSize, "shortPositionSize");
		checkUint(state.longOpenInterest, "longOpenInterest");
		checkUint(state.shortOpenInterest, "shortOpenInterest");
		checkedInt256(state.currentFundingRate, "currentFundingRate");
		checkedInt256(state.accumFundingLong, "accumFundingLong");
		checkedInt256(state.accumFundingShort, "accumFundingShort");
		this.undo.setEntry(this.markets, marketIndex, state);
	}

	saveAssetClassState(
		caller: CallerCredential,
		assetClass: number,
		state: GlobalAssetClassState,
	): void {
		this.authorizer.assertAuthorized(caller, "saveAssetClassState");
		checkUint(state.sumBorrowingRate, "sumBorrowingRate");
		checkUint(state.reserveValueE30, "reserveValueE30");
		this.undo.setEntry(this.assetClasses, assetClass, state);
	}

	private remove(id: PositionId, subAccount: SubAccount): void {
		this.undo.setEntry(this.positions, id, undefined);
		this.undo.deleteMember(this.activePositions, id);
		const ids = this.subAccountPositions.get(subAccount);
		if (ids) {
			this.undo.deleteMember(ids, id);
			if (ids.size === 0) {
				this.undo.setEntry(this.subAccountPositions, subAccount, undefined);
				this.undo.deleteMember(this.activeAccounts, subAccount);
			}
		}
	}
}

function checkUint(value: bigint, label: string): void {
	checkedUint256(value, label);
}

function checkPosition(position: Position): void {
	checkedInt256(position.positionSizeE30, "positionSizeE30");
	checkedInt256(position.realizedPnlE30, "realizedPnlE30");
	checkedInt256(position.entryFundingRate, "entryFundingRate");
	checkUint(position.avgEntryPriceE30, "avgEntryPriceE30");
	checkUint(position.entryBorrowingRate, "entryBorrowingRate");
	checkUint(position.reserveValueE30, "reserveValueE30");
	checkUint(position.openInterest, "openInterest");
}
