/**
 * MarginCalculator — sub-account health from balances, positions and prices.
 *
 *   collateral   = Σ balance × min price × collateralFactor
 *   equity       = collateral + unrealized PnL − pending fees
 *   IMR / MMR    = Σ |size| × initial / maintenance margin fraction
 *   free margin  = equity − IMR
 *
 * Checks run against state as it stands, so callers validate after
 * applying a change inside their transaction.
 */

import type { ConfigStore } from "../config/config-store.js";
import { MarginError, type OracleError } from "../shared/errors.js";
import { BPS, abs, mulDiv, tokenAmountToUsd } from "../shared/fixed-point.js";
import type { SubAccount } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import type { PositionStore } from "../storage/position-store.js";
import type { Position } from "../storage/types.js";
import { pendingFeeCost, pendingFees, positionPnlUsd } from "./fee-calculator.js";
import type { PriceReader } from "./price-reader.js";

export interface AccountHealth {
	readonly collateralValueE30: bigint;
	readonly unrealizedPnlE30: bigint;
	readonly pendingFeesE30: bigint;
	readonly equityE30: bigint;
	readonly initialMarginRequiredE30: bigint;
	readonly maintenanceMarginRequiredE30: bigint;
	readonly freeCollateralE30: bigint;
}

type MarginFraction = "initialMarginFractionBps" | "maintenanceMarginFractionBps";

export class MarginCalculator {
	private readonly ledger: LedgerStore;
	private readonly positions: PositionStore;
	private readonly config: ConfigStore;
	private readonly prices: PriceReader;

	constructor(
		ledger: LedgerStore,
		positions: PositionStore,
		config: ConfigStore,
		prices: PriceReader,
	) {
		this.ledger = ledger;
		this.positions = positions;
		this.config = config;
		this.prices = prices;
	}

	/** Haircut USD value of every token the sub-account holds. */
	collateralValue(subAccount: SubAccount): Result<bigint, OracleError> {
		let total = 0n;
		for (const token of this.ledger.traderTokens(subAccount)) {
			const config = this.config.collateralToken(token);
			if (!config) continue;
			const price = this.prices(config.assetId, false);
			if (!price.ok) return price;
			const value = tokenAmountToUsd(
				this.ledger.traderBalance(subAccount, token),
				price.value,
				config.decimals,
			);
			total += mulDiv(value, BigInt(config.collateralFactorBps), BPS);
		}
		return ok(total);
	}

	/**
	 * Unrealized PnL across open positions: longs valued at the min price,
	 * shorts at the max. Each profit counts at pnlFactorBps; losses in full.
	 */
	unrealizedPnl(subAccount: SubAccount): Result<bigint, OracleError> {
		const pnlFactor = BigInt(this.config.pnlFactorBps());
		let total = 0n;
		for (const position of this.positions.positionsOf(subAccount)) {
			const pnl = this.positionPnl(position);
			if (!pnl.ok) return pnl;
			total += pnl.value > 0n ? mulDiv(pnl.value, pnlFactor, BPS) : pnl.value;
		}
		return ok(total);
	}

	/** Raw PnL of one position at the price it would close at. */
	positionPnl(position: Position): Result<bigint, OracleError> {
		const market = this.config.market(position.marketIndex);
		if (!market) return ok(0n);
		const price = this.prices(market.assetId, position.positionSizeE30 < 0n);
		if (!price.ok) return price;
		return ok(positionPnlUsd(position.positionSizeE30, position.avgEntryPriceE30, price.value));
	}

	/** Borrowing and funding accrued since each position's entry snapshot. */
	pendingFees(subAccount: SubAccount): bigint {
		let total = 0n;
		for (const position of this.positions.positionsOf(subAccount)) {
			const market = this.config.market(position.marketIndex);
			if (!market) continue;
			const fees = pendingFees(
				position,
				this.positions.marketState(position.marketIndex),
				this.positions.assetClassState(market.assetClass),
			);
			total += pendingFeeCost(position, fees);
		}
		return total;
	}

	initialMarginRequired(subAccount: SubAccount): bigint {
		return this.marginRequired(subAccount, "initialMarginFractionBps");
	}

	maintenanceMarginRequired(subAccount: SubAccount): bigint {
		return this.marginRequired(subAccount, "maintenanceMarginFractionBps");
	}

	health(subAccount: SubAccount): Result<AccountHealth, OracleError> {
		const collateral = this.collateralValue(subAccount);
		if (!collateral.ok) return collateral;
		const pnl = this.unrealizedPnl(subAccount);
		if (!pnl.ok) return pnl;

		const fees = this.pendingFees(subAccount);
		const equity = collateral.value + pnl.value - fees;
		const imr = this.initialMarginRequired(subAccount);
		return ok({
			collateralValueE30: collateral.value,
			unrealizedPnlE30: pnl.value,
			pendingFeesE30: fees,
			equityE30: equity,
			initialMarginRequiredE30: imr,
			maintenanceMarginRequiredE30: this.maintenanceMarginRequired(subAccount),
			freeCollateralE30: equity - imr,
		});
	}

	// ── Checks ─────────────────────────────────────────────────────

	/** After a withdrawal, equity must still cover the IMR. */
	validateWithdraw(subAccount: SubAccount): Result<AccountHealth, MarginError | OracleError> {
		return this.requireImr(
			subAccount,
			"WithdrawBalanceBelowIMR",
			"Withdrawal leaves equity below IMR",
		);
	}

	/** After an increase, free collateral must not be negative. */
	validateIncrease(subAccount: SubAccount): Result<AccountHealth, MarginError | OracleError> {
		return this.requireImr(
			subAccount,
			"InsufficientFreeCollateral",
			"Not enough free collateral for the new position size",
		);
	}

	/** After a partial decrease, the remaining positions must still meet IMR. */
	validateDecrease(subAccount: SubAccount): Result<AccountHealth, MarginError | OracleError> {
		return this.requireImr(subAccount, "DecreaseBelowIMR", "Decrease leaves equity below IMR");
	}

	/** Equity below maintenance margin. */
	isLiquidatable(subAccount: SubAccount): Result<boolean, OracleError> {
		const health = this.health(subAccount);
		if (!health.ok) return health;
		return ok(health.value.equityE30 < health.value.maintenanceMarginRequiredE30);
	}

	private requireImr(
		subAccount: SubAccount,
		code: MarginError["code"],
		message: string,
	): Result<AccountHealth, MarginError | OracleError> {
		const health = this.health(subAccount);
		if (!health.ok) return health;
		if (health.value.freeCollateralE30 < 0n) {
			return err(
				new MarginError(code, message, {
					subAccount,
					equityE30: health.value.equityE30,
					initialMarginRequiredE30: health.value.initialMarginRequiredE30,
				}),
			);
		}
		return health;
	}

	private marginRequired(subAccount: SubAccount, fraction: MarginFraction): bigint {
		let total = 0n;
		for (const position of this.positions.positionsOf(subAccount)) {
			const market = this.config.market(position.marketIndex);
			if (!market) continue;
			total += mulDiv(abs(position.positionSizeE30), BigInt(market[fraction]), BPS);
		}
		return total;
	}
}
