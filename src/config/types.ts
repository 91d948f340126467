/** Protocol configuration as the settlement core reads it. */

import type { AssetId, TokenAddress } from "../shared/identifiers.js";

/** A token traders may post as collateral; list order is the fee walk order. */
export interface CollateralTokenConfig {
	readonly token: TokenAddress;
	readonly assetId: AssetId;
	readonly decimals: number;
	/** Share of the token's value counted toward equity. */
	readonly collateralFactorBps: number;
	/** Whether new deposits are taken. Existing balances still settle fees. */
	readonly accepted: boolean;
}

export interface MarketConfig {
	readonly marketIndex: number;
	readonly assetId: AssetId;
	readonly assetClass: number;
	readonly initialMarginFractionBps: number;
	readonly maintenanceMarginFractionBps: number;
	readonly increasePositionFeeRateBps: number;
	readonly decreasePositionFeeRateBps: number;
	/** Per-interval funding rate cap, 1e18. */
	readonly maxFundingRate: bigint;
	/** Skew (USD E30) at which the funding rate reaches its cap. */
	readonly maxSkewScaleUsdE30: bigint;
	/** Reserve value = IMR × maxProfitRate; drives borrowing fees. */
	readonly maxProfitRateBps: number;
	readonly active: boolean;
}

export interface AssetClassConfig {
	readonly assetClass: number;
	/** Per-interval borrowing rate at 100% utilization, 1e18. */
	readonly baseBorrowingRate: bigint;
}

export interface OracleConfig {
	readonly maxPriceAgeSeconds: number;
	/** Maximum confidence / price ratio in parts per million; 0 disables the check. */
	readonly confidenceThresholdE6: number;
}

export interface ProtocolConfig {
	readonly fundingIntervalSeconds: number;
	readonly devFeeRateBps: number;
	/** Share of unrealized profit counted toward equity. */
	readonly pnlFactorBps: number;
	readonly liquidationFeeUsdE30: bigint;
	readonly oracle: OracleConfig;
	readonly collateralTokens: readonly CollateralTokenConfig[];
	readonly markets: readonly MarketConfig[];
	readonly assetClasses: readonly AssetClassConfig[];
}
