export type {
	AssetClassConfig,
	CollateralTokenConfig,
	MarketConfig,
	OracleConfig,
	ProtocolConfig,
} from "./types.js";
export { type RawProtocolConfig, protocolConfigSchema } from "./schema.js";
export { type ConfigOverrides, configFromEnv } from "./env.js";
export { applyOverrides, loadProtocolConfig, loadProtocolConfigFile } from "./loader.js";
export { ConfigStore } from "./config-store.js";
