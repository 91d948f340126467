export type {
	Collection,
	FeeLeg,
	FundingPayer,
	SeizeDestination,
	SettlementReceipt,
} from "./types.js";
export {
	type WalkDirection,
	type WalkLeg,
	type WalkOutcome,
	type WalkParams,
	type WalkSource,
	walkTokens,
} from "./token-walk.js";
export {
	type FeeSettlementDeps,
	FeeSettlementEngine,
	type FundingOutcome,
	type SettlementError,
} from "./fee-settlement.js";
export { RateAccumulator, type RateAccumulatorDeps } from "./rate-accumulator.js";
