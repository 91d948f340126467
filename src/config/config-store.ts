/**
 * ConfigStore — the configuration capability read by the settlement core.
 *
 * Reads are open; writes take the owner credential. Collateral tokens keep
 * their configured order, which is the order every fee walk visits them.
 */

import type { Allowlist } from "../auth/access-control.js";
import type { CallerCredential } from "../auth/types.js";
import { ConfigError } from "../shared/errors.js";
import type { AssetId, TokenAddress } from "../shared/identifiers.js";
import type {
	AssetClassConfig,
	CollateralTokenConfig,
	MarketConfig,
	OracleConfig,
	ProtocolConfig,
} from "./types.js";

const BPS_MAX = 10_000;

export class ConfigStore {
	private readonly allowlist: Allowlist;
	private fundingInterval: number;
	private devFeeBps: number;
	private pnlFactor: number;
	private liquidationFee: bigint;
	private oracleConfig: OracleConfig;
	private readonly tokens = new Map<TokenAddress, CollateralTokenConfig>();
	private readonly marketConfigs = new Map<number, MarketConfig>();
	private readonly assetClassConfigs = new Map<number, AssetClassConfig>();

	constructor(config: ProtocolConfig, allowlist: Allowlist) {
		this.allowlist = allowlist;
		this.fundingInterval = config.fundingIntervalSeconds;
		this.devFeeBps = config.devFeeRateBps;
		this.pnlFactor = config.pnlFactorBps;
		this.liquidationFee = config.liquidationFeeUsdE30;
		this.oracleConfig = config.oracle;
		for (const token of config.collateralTokens) this.tokens.set(token.token, token);
		for (const market of config.markets) this.marketConfigs.set(market.marketIndex, market);
		for (const ac of config.assetClasses) this.assetClassConfigs.set(ac.assetClass, ac);
	}

	// ── Reads ──────────────────────────────────────────────────────

	fundingIntervalSeconds(): number {
		return this.fundingInterval;
	}

	devFeeRateBps(): number {
		return this.devFeeBps;
	}

	pnlFactorBps(): number {
		return this.pnlFactor;
	}

	liquidationFeeUsdE30(): bigint {
		return this.liquidationFee;
	}

	oracle(): OracleConfig {
		return this.oracleConfig;
	}

	/** Every configured collateral token, in walk order. */
	collateralTokens(): readonly CollateralTokenConfig[] {
		return [...this.tokens.values()];
	}

	collateralToken(token: TokenAddress): CollateralTokenConfig | undefined {
		return this.tokens.get(token);
	}

	/** The collateral token priced by `asset`, if any. */
	tokenForAsset(asset: AssetId): CollateralTokenConfig | undefined {
		for (const config of this.tokens.values()) {
			if (config.assetId === asset) return config;
		}
		return undefined;
	}

	market(marketIndex: number): MarketConfig | undefined {
		return this.marketConfigs.get(marketIndex);
	}

	markets(): readonly MarketConfig[] {
		return [...this.marketConfigs.values()];
	}

	assetClass(assetClass: number): AssetClassConfig | undefined {
		return this.assetClassConfigs.get(assetClass);
	}

	/** Market indexes belonging to an asset class. */
	marketsInAssetClass(assetClass: number): readonly number[] {
		return this.markets()
			.filter((m) => m.assetClass === assetClass)
			.map((m) => m.marketIndex);
	}

	// ── Owner-only writes ──────────────────────────────────────────

	setFundingInterval(owner: CallerCredential, seconds: number): void {
		this.allowlist.assertOwner(owner, "setFundingInterval");
		if (!Number.isInteger(seconds) || seconds <= 0) {
			throw new ConfigError("Funding interval must be a positive integer", { seconds });
		}
		this.fundingInterval = seconds;
	}

	setDevFeeRateBps(owner: CallerCredential, bps: number): void {
		this.allowlist.assertOwner(owner, "setDevFeeRateBps");
		this.checkBps("devFeeRateBps", bps);
		this.devFeeBps = bps;
	}

	setPnlFactorBps(owner: CallerCredential, bps: number): void {
		this.allowlist.assertOwner(owner, "setPnlFactorBps");
		this.checkBps("pnlFactorBps", bps);
		this.pnlFactor = bps;
	}

	setOracleConfig(owner: CallerCredential, config: OracleConfig): void {
		this.allowlist.assertOwner(owner, "setOracleConfig");
		this.oracleConfig = config;
	}

	/** Adds or replaces a market's configuration. */
	setMarketConfig(owner: CallerCredential, config: MarketConfig): void {
		this.allowlist.assertOwner(owner, "setMarketConfig");
		if (!this.assetClassConfigs.has(config.assetClass)) {
			throw new ConfigError(`Unknown asset class ${config.assetClass}`, {
				marketIndex: config.marketIndex,
			});
		}
		if (config.maintenanceMarginFractionBps > config.initialMarginFractionBps) {
			throw new ConfigError("Maintenance margin fraction exceeds initial margin fraction", {
				marketIndex: config.marketIndex,
			});
		}
		this.marketConfigs.set(config.marketIndex, config);
	}

	setAssetClassConfig(owner: CallerCredential, config: AssetClassConfig): void {
		this.allowlist.assertOwner(owner, "setAssetClassConfig");
		this.assetClassConfigs.set(config.assetClass, config);
	}

	/** Adds a token at the end of the walk order, or updates it in place. */
	setCollateralToken(owner: CallerCredential, config: CollateralTokenConfig): void {
		this.allowlist.assertOwner(owner, "setCollateralToken");
		this.checkBps("collateralFactorBps", config.collateralFactorBps);
		this.tokens.set(config.token, config);
	}

	private checkBps(field: string, bps: number): void {
		if (!Number.isInteger(bps) || bps < 0 || bps > BPS_MAX) {
			throw new ConfigError(`${field} must be an integer in [0, ${BPS_MAX}]`, { field, bps });
		}
	}
}
