export { type PriceReader, oraclePriceReader } from "./price-reader.js";
export {
	type PendingFees,
	averageEntryPrice,
	borrowingFeeUsd,
	fundingFeeUsd,
	openInterestFor,
	pendingFeeCost,
	pendingFees,
	positionPnlUsd,
	reserveValueFor,
	sideFundingAccumulator,
	tradingFeeUsd,
	traderPaysFunding,
} from "./fee-calculator.js";
export {
	type FundingSplit,
	type PriceOverride,
	RateCalculator,
	splitFundingRate,
} from "./rate-calculator.js";
export { type AccountHealth, MarginCalculator } from "./margin-calculator.js";
