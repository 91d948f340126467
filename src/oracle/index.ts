export type {
	AdaptivePriceInput,
	AdaptivePricer,
	MarketStatus,
	PriceQuote,
	PriceRecord,
	PriceSource,
} from "./types.js";
export { linearSkewPricer, passThroughPricer } from "./adaptive-pricer.js";
export { InMemoryPriceSource } from "./memory-price-source.js";
export { OracleGateway, type OracleGatewayOptions, type SkewContext } from "./oracle-gateway.js";
