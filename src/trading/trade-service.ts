/**
 * TradeService — increases and decreases positions.
 *
 * Every call runs as one transaction: rates are brought up to date, fees
 * are settled against the old snapshots, the position and the global state
 * move to the new size, PnL is realized on a decrease, and the account's
 * margin is checked last. Any failure leaves every store as it was.
 */

import type { Authorizer, CallerCredential } from "../auth/types.js";
import {
	averageEntryPrice,
	openInterestFor,
	positionPnlUsd,
} from "../calculator/fee-calculator.js";
import type { MarginCalculator } from "../calculator/margin-calculator.js";
import type { ConfigStore } from "../config/config-store.js";
import type { MarketConfig } from "../config/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { OracleGateway } from "../oracle/oracle-gateway.js";
import type { FeeSettlementEngine } from "../settlement/fee-settlement.js";
import type { RateAccumulator } from "../settlement/rate-accumulator.js";
import { type OracleError, PositionError } from "../shared/errors.js";
import { abs, mulDiv } from "../shared/fixed-point.js";
import { subAccountOf } from "../shared/identifiers.js";
import { type Result, err, map, ok } from "../shared/result.js";
import { type Clock, unixSeconds } from "../shared/time.js";
import type { PositionStore } from "../storage/position-store.js";
import type { UndoLog } from "../storage/undo-log.js";
import type { EngineEvents } from "./events.js";
import { MarketBook, emptyPosition } from "./market-book.js";
import type {
	DecreasePositionRequest,
	IncreasePositionRequest,
	PositionChange,
	TradeError,
} from "./types.js";

export interface TradeServiceDeps {
	readonly authorizer: Authorizer;
	readonly positions: PositionStore;
	readonly config: ConfigStore;
	readonly oracle: OracleGateway;
	readonly accumulator: RateAccumulator;
	readonly fees: FeeSettlementEngine;
	readonly margin: MarginCalculator;
	readonly undo: UndoLog;
	readonly clock: Clock;
	readonly credential: CallerCredential;
	readonly events: EngineEvents;
	readonly logger?: Logger;
}

export class TradeService {
	private readonly authorizer: Authorizer;
	private readonly positions: PositionStore;
	private readonly config: ConfigStore;
	private readonly oracle: OracleGateway;
	private readonly accumulator: RateAccumulator;
	private readonly fees: FeeSettlementEngine;
	private readonly margin: MarginCalculator;
	private readonly undo: UndoLog;
	private readonly clock: Clock;
	private readonly events: EngineEvents;
	private readonly book: MarketBook;
	private readonly logger: Logger;

	constructor(deps: TradeServiceDeps) {
		this.authorizer = deps.authorizer;
		this.positions = deps.positions;
		this.config = deps.config;
		this.oracle = deps.oracle;
		this.accumulator = deps.accumulator;
		this.fees = deps.fees;
		this.margin = deps.margin;
		this.undo = deps.undo;
		this.clock = deps.clock;
		this.events = deps.events;
		this.book = new MarketBook(deps.positions, deps.credential);
		this.logger = (deps.logger ?? silentLogger()).child({ module: "trade-service" });
	}

	/** Opens or grows a position on the side of `sizeDeltaE30`. */
	increasePosition(
		caller: CallerCredential,
		request: IncreasePositionRequest,
	): Result<PositionChange, TradeError> {
		this.authorizer.assertAuthorized(caller, "increasePosition");
		return this.publish(
			"increase",
			this.undo.atomic(() => this.increase(request)),
		);
	}

	/** Shrinks or closes a position, realizing PnL on the closed part. */
	decreasePosition(
		caller: CallerCredential,
		request: DecreasePositionRequest,
	): Result<PositionChange, TradeError> {
		this.authorizer.assertAuthorized(caller, "decreasePosition");
		return this.publish(
			"decrease",
			this.undo.atomic(() => this.decrease(request)),
		);
	}

	// ── Internals ──────────────────────────────────────────────────

	private increase(request: IncreasePositionRequest): Result<PositionChange, TradeError> {
		const { primaryAccount, subAccountId, marketIndex, sizeDeltaE30 } = request;
		const market = this.marketFor(marketIndex);
		if (!market.ok) return market;
		if (!market.value.active) {
			return err(
				new PositionError("MarketInactive", `Market ${marketIndex} is not open for increases`, {
					marketIndex,
				}),
			);
		}
		if (sizeDeltaE30 === 0n) {
			return err(
				new PositionError("InvalidSizeDelta", "Size delta must not be zero", { marketIndex }),
			);
		}

		const subAccount = subAccountOf(primaryAccount, subAccountId);
		const position =
			this.positions.positionOf(subAccount, marketIndex) ??
			emptyPosition(primaryAccount, subAccountId, marketIndex);
		if (position.positionSizeE30 !== 0n && position.positionSizeE30 > 0n !== sizeDeltaE30 > 0n) {
			return err(
				new PositionError("InvalidSizeDelta", "An increase must be on the open position's side", {
					marketIndex,
					positionSizeE30: position.positionSizeE30,
				}),
			);
		}

		const rates = this.updateRates(market.value);
		if (!rates.ok) return rates;
		const fill = this.fillPrice(market.value, sizeDeltaE30);
		if (!fill.ok) return fill;

		const fees = this.fees.settleAllFees(
			position,
			abs(sizeDeltaE30),
			market.value.increasePositionFeeRateBps,
			market.value.assetClass,
			marketIndex,
		);
		if (!fees.ok) return fees;

		const sizeE30 = position.positionSizeE30 + sizeDeltaE30;
		const openInterest = position.openInterest + openInterestFor(sizeDeltaE30, fill.value);
		const next = this.book.resize(position, market.value, {
			sizeE30,
			openInterest,
			avgEntryPriceE30: averageEntryPrice(sizeE30, openInterest),
			realizedPnlE30: position.realizedPnlE30,
			lastIncreaseTimestamp: unixSeconds(this.clock),
		});

		const health = this.margin.validateIncrease(subAccount);
		if (!health.ok) return health;

		return ok({
			subAccount,
			marketIndex,
			previousSizeE30: position.positionSizeE30,
			sizeE30: next.positionSizeE30,
			avgEntryPriceE30: next.avgEntryPriceE30,
			fillPriceE30: fill.value,
			realizedPnlE30: 0n,
			pnlLegs: [],
			fees: fees.value,
			health: health.value,
		});
	}

	private decrease(request: DecreasePositionRequest): Result<PositionChange, TradeError> {
		const { primaryAccount, subAccountId, marketIndex, sizeToDecreaseE30 } = request;
		const market = this.marketFor(marketIndex);
		if (!market.ok) return market;
		if (sizeToDecreaseE30 <= 0n) {
			return err(
				new PositionError("InvalidSizeDelta", "Size to decrease must be positive", { marketIndex }),
			);
		}

		const subAccount = subAccountOf(primaryAccount, subAccountId);
		const position = this.positions.positionOf(subAccount, marketIndex);
		if (!position) {
			return err(
				new PositionError("PositionNotFound", `No open position in market ${marketIndex}`, {
					subAccount,
					marketIndex,
				}),
			);
		}
		const absSize = abs(position.positionSizeE30);
		if (sizeToDecreaseE30 > absSize) {
			return err(
				new PositionError("DecreaseTooLarge", "Size to decrease exceeds the position size", {
					marketIndex,
					positionSizeE30: position.positionSizeE30,
					sizeToDecreaseE30,
				}),
			);
		}

		const rates = this.updateRates(market.value);
		if (!rates.ok) return rates;
		const isLong = position.positionSizeE30 > 0n;
		const sizeDeltaE30 = isLong ? -sizeToDecreaseE30 : sizeToDecreaseE30;
		const fill = this.fillPrice(market.value, sizeDeltaE30);
		if (!fill.ok) return fill;

		const fees = this.fees.settleAllFees(
			position,
			sizeToDecreaseE30,
			market.value.decreasePositionFeeRateBps,
			market.value.assetClass,
			marketIndex,
		);
		if (!fees.ok) return fees;

		const pnl = mulDiv(
			positionPnlUsd(position.positionSizeE30, position.avgEntryPriceE30, fill.value),
			sizeToDecreaseE30,
			absSize,
		);
		const pnlLegs = this.fees.realizePnl(subAccount, pnl);
		if (!pnlLegs.ok) return pnlLegs;

		const closing = sizeToDecreaseE30 === absSize;
		const oiRemoved = closing
			? position.openInterest
			: mulDiv(position.openInterest, sizeToDecreaseE30, absSize);
		const next = this.book.resize(position, market.value, {
			sizeE30: position.positionSizeE30 + sizeDeltaE30,
			openInterest: position.openInterest - oiRemoved,
			avgEntryPriceE30: position.avgEntryPriceE30,
			realizedPnlE30: position.realizedPnlE30 + pnl,
			lastIncreaseTimestamp: position.lastIncreaseTimestamp,
		});

		const health = this.margin.validateDecrease(subAccount);
		if (!health.ok) return health;

		return ok({
			subAccount,
			marketIndex,
			previousSizeE30: position.positionSizeE30,
			sizeE30: next.positionSizeE30,
			avgEntryPriceE30: next.avgEntryPriceE30,
			fillPriceE30: fill.value,
			realizedPnlE30: pnl,
			pnlLegs: pnlLegs.value,
			fees: fees.value,
			health: health.value,
		});
	}

	private marketFor(marketIndex: number): Result<MarketConfig, PositionError> {
		const market = this.config.market(marketIndex);
		if (!market) {
			return err(new PositionError("MarketNotFound", `Market ${marketIndex} is not configured`));
		}
		return ok(market);
	}

	private updateRates(market: MarketConfig): Result<void, OracleError | PositionError> {
		const borrowing = this.accumulator.updateBorrowingRate(market.assetClass);
		if (!borrowing.ok) return borrowing;
		const funding = this.accumulator.updateFundingRate(market.marketIndex);
		if (!funding.ok) return funding;
		return ok(undefined);
	}

	/** Adaptive price for a signed change: buys fill at the max price, sells at the min. */
	private fillPrice(market: MarketConfig, sizeDeltaE30: bigint): Result<bigint, OracleError> {
		const state = this.positions.marketState(market.marketIndex);
		const { confidenceThresholdE6, maxPriceAgeSeconds } = this.config.oracle();
		const quote = this.oracle.getAdaptivePrice(
			market.assetId,
			sizeDeltaE30 > 0n,
			{
				skewE30: state.longPositionSize - state.shortPositionSize,
				sizeDeltaE30,
				maxSkewScaleE30: market.maxSkewScaleUsdE30,
			},
			confidenceThresholdE6,
			maxPriceAgeSeconds,
		);
		return map(quote, (q) => q.priceE30);
	}

	private publish(
		action: "increase" | "decrease",
		result: Result<PositionChange, TradeError>,
	): Result<PositionChange, TradeError> {
		if (!result.ok) {
			this.logger.warn({ action, code: result.error.code }, "position change rejected");
			return result;
		}
		const change = result.value;
		this.logger.info(
			{
				action,
				subAccount: change.subAccount,
				marketIndex: change.marketIndex,
				sizeE30: change.sizeE30,
				fillPriceE30: change.fillPriceE30,
				realizedPnlE30: change.realizedPnlE30,
			},
			"position changed",
		);
		this.events.emit("feesSettled", change.fees);
		this.events.emit("positionChanged", change);
		return result;
	}
}
