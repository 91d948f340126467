/**
 * Requests and receipts of the trading services.
 */

import type { AccountHealth } from "../calculator/margin-calculator.js";
import type { FeeLeg, SettlementReceipt } from "../settlement/types.js";
import type { CoverageError, MarginError, OracleError, PositionError } from "../shared/errors.js";
import type { PrimaryAccount, SubAccount, TokenAddress } from "../shared/identifiers.js";

export interface IncreasePositionRequest {
	readonly primaryAccount: PrimaryAccount;
	readonly subAccountId: number;
	readonly marketIndex: number;
	/** Signed USD E30: positive grows a long, negative grows a short. */
	readonly sizeDeltaE30: bigint;
}

export interface DecreasePositionRequest {
	readonly primaryAccount: PrimaryAccount;
	readonly subAccountId: number;
	readonly marketIndex: number;
	/** USD E30 to close, positive, at most the position's |size|. */
	readonly sizeToDecreaseE30: bigint;
}

export interface PositionChange {
	readonly subAccount: SubAccount;
	readonly marketIndex: number;
	readonly previousSizeE30: bigint;
	/** Zero when the position was closed. */
	readonly sizeE30: bigint;
	readonly avgEntryPriceE30: bigint;
	readonly fillPriceE30: bigint;
	/** PnL realized by this change; zero for increases. */
	readonly realizedPnlE30: bigint;
	readonly pnlLegs: readonly FeeLeg[];
	readonly fees: SettlementReceipt;
	readonly health: AccountHealth;
}

export interface CollateralRequest {
	readonly primaryAccount: PrimaryAccount;
	readonly subAccountId: number;
	readonly token: TokenAddress;
	/** Native token units. */
	readonly amount: bigint;
}

export interface CollateralMovement {
	readonly subAccount: SubAccount;
	readonly token: TokenAddress;
	readonly amount: bigint;
	/** Balance after the movement. */
	readonly balance: bigint;
}

export interface LiquidatedPosition {
	readonly marketIndex: number;
	readonly sizeE30: bigint;
	readonly borrowingFeeE30: bigint;
	/** Signed, long perspective. */
	readonly fundingFeeE30: bigint;
	readonly realizedPnlE30: bigint;
}

export interface LiquidationReceipt {
	readonly subAccount: SubAccount;
	readonly liquidator: SubAccount;
	readonly equityE30: bigint;
	readonly maintenanceMarginRequiredE30: bigint;
	readonly positions: readonly LiquidatedPosition[];
	/** Liquidation fee actually paid to the liquidator. */
	readonly liquidationFeeE30: bigint;
	/** USD the account could not cover, recorded against it. */
	readonly badDebtE30: bigint;
}

export type TradeError = CoverageError | OracleError | PositionError | MarginError;
export type CollateralError = OracleError | PositionError | MarginError;
export type LiquidationError = CoverageError | OracleError | PositionError | MarginError;
