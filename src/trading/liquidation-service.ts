/**
 * LiquidationService — closes every position of an account whose equity
 * has fallen below its maintenance margin.
 *
 * Amounts the pool owes the trader (funding received, profit) are paid
 * first, across every position, and stay all-or-nothing. Only then does
 * liquidation settle best-effort: each fee, the loss and the liquidation
 * fee take what the trader's basket still holds, and whatever stays
 * uncovered is recorded as the account's bad debt.
 */

import type { Authorizer, CallerCredential } from "../auth/types.js";
import { type PendingFees, pendingFees, traderPaysFunding } from "../calculator/fee-calculator.js";
import type { MarginCalculator } from "../calculator/margin-calculator.js";
import type { ConfigStore } from "../config/config-store.js";
import type { MarketConfig } from "../config/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { FeeSettlementEngine } from "../settlement/fee-settlement.js";
import type { RateAccumulator } from "../settlement/rate-accumulator.js";
import { MarginError, PositionError } from "../shared/errors.js";
import { abs } from "../shared/fixed-point.js";
import type { SubAccount } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import type { PositionStore } from "../storage/position-store.js";
import type { Position } from "../storage/types.js";
import type { UndoLog } from "../storage/undo-log.js";
import type { EngineEvents } from "./events.js";
import { MarketBook } from "./market-book.js";
import type { LiquidatedPosition, LiquidationError, LiquidationReceipt } from "./types.js";

export interface LiquidationServiceDeps {
	readonly authorizer: Authorizer;
	readonly ledger: LedgerStore;
	readonly positions: PositionStore;
	readonly config: ConfigStore;
	readonly accumulator: RateAccumulator;
	readonly fees: FeeSettlementEngine;
	readonly margin: MarginCalculator;
	readonly undo: UndoLog;
	readonly credential: CallerCredential;
	readonly events: EngineEvents;
	readonly logger?: Logger;
}

interface ClosingPlan {
	readonly position: Position;
	readonly market: MarketConfig;
	readonly pending: PendingFees;
	readonly pnlE30: bigint;
}

export class LiquidationService {
	private readonly authorizer: Authorizer;
	private readonly ledger: LedgerStore;
	private readonly positions: PositionStore;
	private readonly config: ConfigStore;
	private readonly accumulator: RateAccumulator;
	private readonly fees: FeeSettlementEngine;
	private readonly margin: MarginCalculator;
	private readonly undo: UndoLog;
	private readonly credential: CallerCredential;
	private readonly events: EngineEvents;
	private readonly book: MarketBook;
	private readonly logger: Logger;

	constructor(deps: LiquidationServiceDeps) {
		this.authorizer = deps.authorizer;
		this.ledger = deps.ledger;
		this.positions = deps.positions;
		this.config = deps.config;
		this.accumulator = deps.accumulator;
		this.fees = deps.fees;
		this.margin = deps.margin;
		this.undo = deps.undo;
		this.credential = deps.credential;
		this.events = deps.events;
		this.book = new MarketBook(deps.positions, deps.credential);
		this.logger = (deps.logger ?? silentLogger()).child({ module: "liquidation" });
	}

	/**
	 * Liquidates `subAccount`, paying the liquidation fee to `liquidator`.
	 * Fails with AccountHealthy while equity covers maintenance margin.
	 */
	liquidate(
		caller: CallerCredential,
		subAccount: SubAccount,
		liquidator: SubAccount,
	): Result<LiquidationReceipt, LiquidationError> {
		this.authorizer.assertAuthorized(caller, "liquidate");
		const result = this.undo.atomic(() => this.run(subAccount, liquidator));
		if (!result.ok) {
			this.logger.warn({ subAccount, code: result.error.code }, "liquidation rejected");
			return result;
		}
		this.logger.info(
			{
				subAccount,
				liquidator,
				positions: result.value.positions.length,
				badDebtE30: result.value.badDebtE30,
			},
			"account liquidated",
		);
		this.events.emit("accountLiquidated", result.value);
		return result;
	}

	private run(
		subAccount: SubAccount,
		liquidator: SubAccount,
	): Result<LiquidationReceipt, LiquidationError> {
		const open = this.positions.positionsOf(subAccount);
		for (const position of open) {
			const updated = this.updateRates(position.marketIndex);
			if (!updated.ok) return updated;
		}

		const health = this.margin.health(subAccount);
		if (!health.ok) return health;
		const { equityE30, maintenanceMarginRequiredE30 } = health.value;
		if (equityE30 >= maintenanceMarginRequiredE30) {
			return err(
				new MarginError("AccountHealthy", "Equity covers maintenance margin", {
					subAccount,
					equityE30,
					maintenanceMarginRequiredE30,
				}),
			);
		}

		const plans: ClosingPlan[] = [];
		for (const position of open) {
			const plan = this.plan(position);
			if (!plan.ok) return plan;
			plans.push(plan.value);
		}

		// Pool → trader first, so profits on one market offset losses on another.
		for (const plan of plans) {
			const paid = this.payTrader(subAccount, plan);
			if (!paid.ok) return paid;
		}

		let badDebt = 0n;
		const closed: LiquidatedPosition[] = [];
		for (const plan of plans) {
			const seized = this.seizeFromTrader(subAccount, plan);
			if (!seized.ok) return seized;
			badDebt += seized.value;
			closed.push(this.close(plan));
		}

		const fee = this.fees.seize(subAccount, this.config.liquidationFeeUsdE30(), {
			kind: "trader",
			subAccount: liquidator,
		});
		if (!fee.ok) return fee;
		badDebt += fee.value.remainingE30;
		this.ledger.addBadDebt(this.credential, subAccount, badDebt);

		return ok({
			subAccount,
			liquidator,
			equityE30,
			maintenanceMarginRequiredE30,
			positions: closed,
			liquidationFeeE30: fee.value.coveredE30,
			badDebtE30: badDebt,
		});
	}

	/** Prices one position's pending fees and PnL before anything moves. */
	private plan(position: Position): Result<ClosingPlan, LiquidationError> {
		const market = this.config.market(position.marketIndex);
		if (!market) {
			return err(
				new PositionError("MarketNotFound", `Market ${position.marketIndex} is not configured`),
			);
		}
		const pending = pendingFees(
			position,
			this.positions.marketState(market.marketIndex),
			this.positions.assetClassState(market.assetClass),
		);
		const pnl = this.margin.positionPnl(position);
		if (!pnl.ok) return pnl;
		return ok({ position, market, pending, pnlE30: pnl.value });
	}

	/** Funding received and profit. All-or-nothing, like any pool payout. */
	private payTrader(subAccount: SubAccount, plan: ClosingPlan): Result<void, LiquidationError> {
		const size = plan.position.positionSizeE30;
		if (!traderPaysFunding(size, plan.pending.fundingFeeE30)) {
			const funding = this.fees.settleFundingFee(subAccount, size, plan.pending.fundingFeeE30);
			if (!funding.ok) return funding;
		}
		if (plan.pnlE30 > 0n) {
			const profit = this.fees.realizePnl(subAccount, plan.pnlE30);
			if (!profit.ok) return profit;
		}
		return ok(undefined);
	}

	/** Borrowing, funding owed and loss, best-effort. Returns the USD left uncovered. */
	private seizeFromTrader(
		subAccount: SubAccount,
		plan: ClosingPlan,
	): Result<bigint, LiquidationError> {
		const { pending, pnlE30 } = plan;
		let uncovered = 0n;

		const borrowing = this.fees.seize(subAccount, pending.borrowingFeeE30, {
			kind: "fee",
			bucket: "liquidity",
		});
		if (!borrowing.ok) return borrowing;
		uncovered += borrowing.value.remainingE30;

		if (traderPaysFunding(plan.position.positionSizeE30, pending.fundingFeeE30)) {
			const funding = this.fees.seize(subAccount, abs(pending.fundingFeeE30), { kind: "funding" });
			if (!funding.ok) return funding;
			uncovered += funding.value.remainingE30;
		}

		if (pnlE30 < 0n) {
			const loss = this.fees.seize(subAccount, -pnlE30, { kind: "pool", bucket: "liquidity" });
			if (!loss.ok) return loss;
			uncovered += loss.value.remainingE30;
		}
		return ok(uncovered);
	}

	private close(plan: ClosingPlan): LiquidatedPosition {
		const { position, market, pending, pnlE30 } = plan;
		this.book.resize(position, market, {
			sizeE30: 0n,
			openInterest: 0n,
			avgEntryPriceE30: 0n,
			realizedPnlE30: position.realizedPnlE30 + pnlE30,
			lastIncreaseTimestamp: position.lastIncreaseTimestamp,
		});
		return {
			marketIndex: market.marketIndex,
			sizeE30: position.positionSizeE30,
			borrowingFeeE30: pending.borrowingFeeE30,
			fundingFeeE30: pending.fundingFeeE30,
			realizedPnlE30: pnlE30,
		};
	}

	private updateRates(marketIndex: number): Result<void, LiquidationError> {
		const market = this.config.market(marketIndex);
		if (!market) {
			return err(new PositionError("MarketNotFound", `Market ${marketIndex} is not configured`));
		}
		const borrowing = this.accumulator.updateBorrowingRate(market.assetClass);
		if (!borrowing.ok) return borrowing;
		const funding = this.accumulator.updateFundingRate(marketIndex);
		if (!funding.ok) return funding;
		return ok(undefined);
	}
}
