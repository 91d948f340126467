export {
	type AssetId,
	type PositionId,
	type PrimaryAccount,
	type SubAccount,
	type TokenAddress,
	assetId,
	positionIdOf,
	primaryAccount,
	subAccountOf,
	tokenAddress,
} from "./identifiers.js";
export { type Result, collect, err, isErr, isOk, map, ok, unwrap } from "./result.js";
export {
	BPS,
	E30,
	MAX_INT256,
	MAX_UINT256,
	MIN_INT256,
	RATE_DECIMALS,
	RATE_PRECISION,
	type Rounding,
	USD_DECIMALS,
	abs,
	applyBps,
	checkedInt256,
	checkedUint256,
	clamp,
	formatUnits,
	formatUsd,
	max,
	min,
	mulDiv,
	parseUnits,
	rate,
	sign,
	tokenAmountToUsd,
	usd,
	usdToTokenAmount,
} from "./fixed-point.js";
export {
	type Clock,
	FakeClock,
	SystemClock,
	floorToInterval,
	unixSeconds,
} from "./time.js";
export {
	AuthorizationError,
	type AuthorizationErrorCode,
	ConfigError,
	CoverageError,
	type CoverageErrorCode,
	ErrorCategory,
	type InvariantErrorCode,
	InvariantViolationError,
	MarginError,
	type MarginErrorCode,
	OracleError,
	type OracleErrorCode,
	PerpError,
	PositionError,
	type PositionErrorCode,
	isAuthorizationError,
	isConfigError,
	isCoverageError,
	isInvariantViolation,
	isMarginError,
	isOracleError,
	isPerpError,
	isPositionError,
} from "./errors.js";
