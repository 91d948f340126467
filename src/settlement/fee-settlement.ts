/**
 * FeeSettlementEngine — realizes trading, borrowing and funding fees
 * against a trader's collateral basket and the pool.
 *
 * Holds no state of its own. Each fee is all-or-nothing: a shortfall fails
 * with that fee's coverage error and settleAllFees() rolls every store
 * write back, including tokens drained earlier in the same walk.
 */

import type { CallerCredential } from "../auth/types.js";
import {
	borrowingFeeUsd,
	fundingFeeUsd,
	sideFundingAccumulator,
	tradingFeeUsd,
	traderPaysFunding,
} from "../calculator/fee-calculator.js";
import type { PriceReader } from "../calculator/price-reader.js";
import type { ConfigStore } from "../config/config-store.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { CoverageError, type OracleError, PositionError } from "../shared/errors.js";
import { abs, applyBps, min, mulDiv } from "../shared/fixed-point.js";
import type { SubAccount } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { LedgerStore, PoolBucket } from "../storage/ledger-store.js";
import { type PositionStore, positionSubAccount } from "../storage/position-store.js";
import type { Position } from "../storage/types.js";
import type { UndoLog } from "../storage/undo-log.js";
import {
	type WalkDirection,
	type WalkLeg,
	type WalkOutcome,
	type WalkSource,
	walkTokens,
} from "./token-walk.js";
import type {
	Collection,
	FeeLeg,
	FundingPayer,
	SeizeDestination,
	SettlementReceipt,
} from "./types.js";

export type SettlementError = CoverageError | OracleError | PositionError;

export interface FeeSettlementDeps {
	readonly ledger: LedgerStore;
	readonly positions: PositionStore;
	readonly config: ConfigStore;
	readonly prices: PriceReader;
	readonly undo: UndoLog;
	/** Credential the engine presents to the stores. */
	readonly credential: CallerCredential;
	readonly logger?: Logger;
}

export interface FundingOutcome {
	readonly payer: FundingPayer;
	readonly legs: readonly FeeLeg[];
}

export class FeeSettlementEngine {
	private readonly ledger: LedgerStore;
	private readonly positions: PositionStore;
	private readonly config: ConfigStore;
	private readonly prices: PriceReader;
	private readonly undo: UndoLog;
	private readonly credential: CallerCredential;
	private readonly logger: Logger;

	constructor(deps: FeeSettlementDeps) {
		this.ledger = deps.ledger;
		this.positions = deps.positions;
		this.config = deps.config;
		this.prices = deps.prices;
		this.undo = deps.undo;
		this.credential = deps.credential;
		this.logger = (deps.logger ?? silentLogger()).child({ module: "fee-settlement" });
	}

	/**
	 * Settles the trading fee on `absSizeDelta`, then borrowing and funding
	 * accrued since the position's entry snapshots. Atomic: on any error no
	 * balance is left changed.
	 *
	 * Does not touch the position's snapshots; the caller re-takes them when
	 * it saves the new size.
	 */
	settleAllFees(
		position: Position,
		absSizeDelta: bigint,
		positionFeeRateBps: number,
		assetClass: number,
		marketIndex: number,
	): Result<SettlementReceipt, SettlementError> {
		return this.undo.atomic(() =>
			this.settle(position, absSizeDelta, positionFeeRateBps, assetClass, marketIndex),
		);
	}

	private settle(
		position: Position,
		absSizeDelta: bigint,
		positionFeeRateBps: number,
		assetClass: number,
		marketIndex: number,
	): Result<SettlementReceipt, SettlementError> {
		if (!this.config.market(marketIndex)) {
			return err(new PositionError("MarketNotFound", `Market ${marketIndex} is not configured`));
		}
		const subAccount = positionSubAccount(position);

		const tradingFee = tradingFeeUsd(absSizeDelta, positionFeeRateBps);
		const trading = this.settleTradingFee(subAccount, tradingFee);
		if (!trading.ok) return trading;

		const borrowingFee = borrowingFeeUsd(
			position.reserveValueE30,
			this.positions.assetClassState(assetClass).sumBorrowingRate,
			position.entryBorrowingRate,
		);
		const borrowing = this.settleBorrowingFee(subAccount, borrowingFee);
		if (!borrowing.ok) return borrowing;

		const fundingFee = fundingFeeUsd(
			position.positionSizeE30,
			sideFundingAccumulator(this.positions.marketState(marketIndex), position.positionSizeE30),
			position.entryFundingRate,
		);
		const funding = this.settleFundingFee(subAccount, position.positionSizeE30, fundingFee);
		if (!funding.ok) return funding;

		return ok({
			subAccount,
			marketIndex,
			tradingFeeE30: tradingFee,
			borrowingFeeE30: borrowingFee,
			fundingFeeE30: fundingFee,
			fundingPayer: funding.value.payer,
			tradingLegs: trading.value,
			borrowingLegs: borrowing.value,
			fundingLegs: funding.value.legs,
		});
	}

	// ── Individual fees ────────────────────────────────────────────

	/** Trader → dev fees and protocol fees. */
	settleTradingFee(
		subAccount: SubAccount,
		feeE30: bigint,
	): Result<readonly FeeLeg[], CoverageError | OracleError> {
		return this.undo.atomic(() =>
			this.chargeTrader(subAccount, feeE30, "protocolFee", "TradingFeeCannotBeCovered"),
		);
	}

	/** Trader → dev fees and pool liquidity. */
	settleBorrowingFee(
		subAccount: SubAccount,
		feeE30: bigint,
	): Result<readonly FeeLeg[], CoverageError | OracleError> {
		return this.undo.atomic(() =>
			this.chargeTrader(subAccount, feeE30, "liquidity", "BorrowingFeeCannotBeCovered"),
		);
	}

	/**
	 * Moves funding between trader and pool. The trader pays when the
	 * position's side and the fee's sign disagree; otherwise the pool pays,
	 * first from the funding-fee reserve, then from liquidity.
	 */
	settleFundingFee(
		subAccount: SubAccount,
		positionSizeE30: bigint,
		feeE30: bigint,
	): Result<FundingOutcome, CoverageError | OracleError> {
		return this.undo.atomic(() => this.moveFunding(subAccount, positionSizeE30, feeE30));
	}

	/**
	 * Settles realized PnL. A profit is paid from pool liquidity; a loss is
	 * drawn from the trader's basket into pool liquidity.
	 */
	realizePnl(
		subAccount: SubAccount,
		pnlE30: bigint,
	): Result<readonly FeeLeg[], CoverageError | OracleError> {
		return this.undo.atomic(() => this.movePnl(subAccount, pnlE30));
	}

	/**
	 * Takes whatever the trader's basket covers of `owedE30` and reports the
	 * rest. Only liquidation settles this way; every other charge is
	 * all-or-nothing.
	 */
	seize(
		subAccount: SubAccount,
		owedE30: bigint,
		destination: SeizeDestination,
	): Result<Collection, OracleError> {
		if (owedE30 <= 0n) return ok({ legs: [], coveredE30: 0n, remainingE30: 0n });
		return this.undo.atomic(() => this.collect(subAccount, owedE30, destination));
	}

	// ── Internals ──────────────────────────────────────────────────

	private movePnl(
		subAccount: SubAccount,
		pnlE30: bigint,
	): Result<readonly FeeLeg[], CoverageError | OracleError> {
		if (pnlE30 === 0n) return ok([]);
		if (pnlE30 < 0n) {
			const loss = -pnlE30;
			const taken = this.collect(subAccount, loss, { kind: "pool", bucket: "liquidity" });
			if (!taken.ok) return taken;
			if (taken.value.remainingE30 > 0n) {
				return this.uncovered("LossCannotBeCovered", subAccount, loss, taken.value);
			}
			return ok(taken.value.legs);
		}
		const paid = this.payFromPool(subAccount, pnlE30, false);
		if (!paid.ok) return paid;
		if (paid.value.remainingE30 > 0n) {
			return this.uncovered("ProfitCannotBeCovered", subAccount, pnlE30, paid.value);
		}
		return ok(paid.value.legs);
	}

	private moveFunding(
		subAccount: SubAccount,
		positionSizeE30: bigint,
		feeE30: bigint,
	): Result<FundingOutcome, CoverageError | OracleError> {
		if (feeE30 === 0n) return ok({ payer: "none", legs: [] });
		const owed = abs(feeE30);

		if (traderPaysFunding(positionSizeE30, feeE30)) {
			const taken = this.collect(subAccount, owed, { kind: "funding" });
			if (!taken.ok) return taken;
			if (taken.value.remainingE30 > 0n) {
				return this.uncovered("FundingFeeCannotBeCovered", subAccount, owed, taken.value);
			}
			return ok({ payer: "trader", legs: taken.value.legs });
		}

		const paid = this.payFromPool(subAccount, owed, true);
		if (!paid.ok) return paid;
		if (paid.value.remainingE30 > 0n) {
			return this.uncovered("FundingFeeCannotBeCovered", subAccount, owed, paid.value);
		}
		return ok({ payer: "pool", legs: paid.value.legs });
	}

	/**
	 * Pool → trader: the funding-fee reserve first when `fromReserve`, then
	 * liquidity. Value drawn from liquidity for funding becomes pool
	 * liquidity debt.
	 */
	private payFromPool(
		subAccount: SubAccount,
		owedE30: bigint,
		fromReserve: boolean,
	): Result<Collection, OracleError> {
		const credit = (leg: WalkLeg) =>
			this.ledger.increaseTraderBalance(this.credential, subAccount, leg.token, leg.amount);
		let legs: readonly WalkLeg[] = [];
		let remaining = owedE30;

		if (fromReserve) {
			const reserve = this.walk(
				remaining,
				this.poolSource("fundingFeeReserve"),
				credit,
				"payout",
			);
			if (!reserve.ok) return reserve;
			legs = reserve.value.legs;
			remaining = reserve.value.remainingE30;
		}
		if (remaining > 0n) {
			const liquidity = this.walk(remaining, this.poolSource("liquidity"), credit, "payout");
			if (!liquidity.ok) return liquidity;
			if (fromReserve) {
				this.ledger.increasePoolLiquidityDebt(this.credential, liquidity.value.coveredE30);
			}
			legs = [...legs, ...liquidity.value.legs];
			remaining = liquidity.value.remainingE30;
		}
		return ok({
			legs: legs.map(withoutDevFee),
			coveredE30: owedE30 - remaining,
			remainingE30: remaining,
		});
	}

	private chargeTrader(
		subAccount: SubAccount,
		feeE30: bigint,
		bucket: "protocolFee" | "liquidity",
		code: CoverageError["code"],
	): Result<readonly FeeLeg[], CoverageError | OracleError> {
		if (feeE30 === 0n) return ok([]);
		const taken = this.collect(subAccount, feeE30, { kind: "fee", bucket });
		if (!taken.ok) return taken;
		if (taken.value.remainingE30 > 0n) return this.uncovered(code, subAccount, feeE30, taken.value);
		return ok(taken.value.legs);
	}

	private collect(
		subAccount: SubAccount,
		owedE30: bigint,
		destination: SeizeDestination,
	): Result<Collection, OracleError> {
		const devFeeBps = this.config.devFeeRateBps();
		const legs: FeeLeg[] = [];

		const walk = this.walk(owedE30, this.traderSource(subAccount), (leg) => {
			let devFeeAmount = 0n;
			switch (destination.kind) {
				case "fee":
					devFeeAmount = applyBps(leg.amount, devFeeBps);
					this.ledger.increasePoolBalance(this.credential, "devFee", leg.token, devFeeAmount);
					this.ledger.increasePoolBalance(
						this.credential,
						destination.bucket,
						leg.token,
						leg.amount - devFeeAmount,
					);
					break;
				case "funding":
					this.creditFunding(leg);
					break;
				case "pool":
					this.ledger.increasePoolBalance(
						this.credential,
						destination.bucket,
						leg.token,
						leg.amount,
					);
					break;
				case "trader":
					this.ledger.increaseTraderBalance(
						this.credential,
						destination.subAccount,
						leg.token,
						leg.amount,
					);
					break;
			}
			legs.push({ token: leg.token, amount: leg.amount, valueE30: leg.valueE30, devFeeAmount });
			this.logger.debug(
				{
					subAccount,
					token: leg.token,
					amount: leg.amount,
					devFeeAmount,
					destination: destination.kind,
				},
				"fee leg settled",
			);
		});
		if (!walk.ok) return walk;
		return ok({ legs, coveredE30: walk.value.coveredE30, remainingE30: walk.value.remainingE30 });
	}

	/** Trader-paid funding repays pool liquidity debt first, then fills the reserve. */
	private creditFunding(leg: WalkLeg): void {
		const debt = this.ledger.poolLiquidityDebtUsd();
		const repaidValue = min(debt, leg.valueE30);
		const toLiquidity =
			repaidValue === 0n || leg.valueE30 === 0n
				? 0n
				: mulDiv(leg.amount, repaidValue, leg.valueE30);
		if (repaidValue > 0n) {
			this.ledger.decreasePoolLiquidityDebt(this.credential, repaidValue);
			this.ledger.increasePoolBalance(this.credential, "liquidity", leg.token, toLiquidity);
		}
		this.ledger.increasePoolBalance(
			this.credential,
			"fundingFeeReserve",
			leg.token,
			leg.amount - toLiquidity,
		);
	}

	private walk(
		owedE30: bigint,
		source: WalkSource,
		onLeg: (leg: WalkLeg) => void,
		direction: WalkDirection = "collect",
	): Result<WalkOutcome, OracleError> {
		return walkTokens({
			owedE30,
			direction,
			tokens: this.config.collateralTokens(),
			source,
			prices: this.prices,
			onLeg,
		});
	}

	private traderSource(subAccount: SubAccount): WalkSource {
		return {
			balanceOf: (token) => this.ledger.traderBalance(subAccount, token),
			debit: (token, amount) =>
				this.ledger.decreaseTraderBalance(this.credential, subAccount, token, amount),
		};
	}

	private poolSource(bucket: PoolBucket): WalkSource {
		return {
			balanceOf: (token) => this.ledger.poolBalance(bucket, token),
			debit: (token, amount) =>
				this.ledger.decreasePoolBalance(this.credential, bucket, token, amount),
		};
	}

	private uncovered(
		code: CoverageError["code"],
		subAccount: SubAccount,
		owedE30: bigint,
		walk: Pick<WalkOutcome, "remainingE30">,
	): Result<never, CoverageError> {
		this.logger.warn(
			{ code, subAccount, owedE30, remainingE30: walk.remainingE30 },
			"fee not covered",
		);
		return err(
			new CoverageError(code, `${code}: ${walk.remainingE30} USD (E30) left uncovered`, {
				subAccount,
				owedE30,
				remainingE30: walk.remainingE30,
			}),
		);
	}
}

function withoutDevFee(leg: WalkLeg): FeeLeg {
	return { token: leg.token, amount: leg.amount, valueE30: leg.valueE30, devFeeAmount: 0n };
}
