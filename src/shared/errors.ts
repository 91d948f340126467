/**
 * PerpError hierarchy — structured error classification.
 *
 * Every error carries a stable `code` (the failure reason surfaced to the
 * caller) and a `category` that groups codes by who is at fault and how the
 * triggering operation is treated. None of them are retried internally.
 */

/** Error categories used to group failure codes. */
export const ErrorCategory = {
	Authorization: "authorization",
	Coverage: "coverage",
	Oracle: "oracle",
	Margin: "margin",
	Position: "position",
	Invariant: "invariant",
	Config: "config",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

export type AuthorizationErrorCode = "NotWhitelisted" | "NotOwner";

export type CoverageErrorCode =
	| "TradingFeeCannotBeCovered"
	| "BorrowingFeeCannotBeCovered"
	| "FundingFeeCannotBeCovered"
	| "LossCannotBeCovered"
	| "ProfitCannotBeCovered";

export type OracleErrorCode =
	| "PriceNotFound"
	| "PriceStale"
	| "MarketStatusUndefined"
	| "MarketClosed"
	| "InvalidPrice"
	| "PriceConfidenceExceeded";

export type MarginErrorCode =
	| "WithdrawBalanceBelowIMR"
	| "InsufficientFreeCollateral"
	| "DecreaseBelowIMR"
	| "AccountHealthy"
	| "InsufficientCollateralBalance"
	| "InvalidCollateralAmount";

export type PositionErrorCode =
	| "PositionNotFound"
	| "InvalidSizeDelta"
	| "DecreaseTooLarge"
	| "MarketNotFound"
	| "MarketInactive"
	| "TokenNotAccepted";

export type InvariantErrorCode =
	| "TokenAlreadyRegistered"
	| "TokenNotRegistered"
	| "TokenBalanceNotZero"
	| "ZeroBalanceRegistration"
	| "InsufficientBalance"
	| "ArithmeticOverflow";

/** Options for constructing PerpError subclasses with an optional cause chain. */
interface PerpErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all settlement-engine failures. */
export class PerpError<C extends string = string> extends Error {
	readonly category: ErrorCategory;
	readonly code: C;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: C,
		category: ErrorCategory,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "PerpError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: stringifyBigints(this.context),
		};
	}
}

function stringifyBigints(context: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(context)) {
		out[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return out;
}

// ── Specific error types ─────────────────────────────────────────────

/** Caller lacks the capability for a store mutation or an owner-only setter. */
export class AuthorizationError extends PerpError<AuthorizationErrorCode> {
	constructor(
		code: AuthorizationErrorCode,
		message: string,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message, code, ErrorCategory.Authorization, context);
		this.name = "AuthorizationError";
	}
}

/** The payer's balances could not cover an amount owed; the operation is rolled back. */
export class CoverageError extends PerpError<CoverageErrorCode> {
	constructor(
		code: CoverageErrorCode,
		message: string,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message, code, ErrorCategory.Coverage, context);
		this.name = "CoverageError";
	}
}

/** A price could not be used: unknown, stale, market closed or too uncertain. */
export class OracleError extends PerpError<OracleErrorCode> {
	constructor(
		code: OracleErrorCode,
		message: string,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message, code, ErrorCategory.Oracle, context);
		this.name = "OracleError";
	}
}

/** Account health would be violated by the requested change. */
export class MarginError extends PerpError<MarginErrorCode> {
	constructor(
		code: MarginErrorCode,
		message: string,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message, code, ErrorCategory.Margin, context);
		this.name = "MarginError";
	}
}

/** The request does not fit the position or market it targets. */
export class PositionError extends PerpError<PositionErrorCode> {
	constructor(
		code: PositionErrorCode,
		message: string,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message, code, ErrorCategory.Position, context);
		this.name = "PositionError";
	}
}

/** Programmer or caller error at a store boundary. Never corrected silently. */
export class InvariantViolationError extends PerpError<InvariantErrorCode> {
	constructor(
		code: InvariantErrorCode,
		message: string,
		context: Record<string, unknown> & PerpErrorOptions = {},
	) {
		super(message, code, ErrorCategory.Invariant, context);
		this.name = "InvariantViolationError";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends PerpError<"CONFIG_ERROR"> {
	constructor(message: string, context: Record<string, unknown> & PerpErrorOptions = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Config, context);
		this.name = "ConfigError";
	}
}

// ── Type guards ──────────────────────────────────────────────────────

export function isPerpError(e: unknown): e is PerpError {
	return e instanceof PerpError;
}

export function isAuthorizationError(e: unknown): e is AuthorizationError {
	return e instanceof AuthorizationError;
}

export function isCoverageError(e: unknown): e is CoverageError {
	return e instanceof CoverageError;
}

export function isOracleError(e: unknown): e is OracleError {
	return e instanceof OracleError;
}

export function isMarginError(e: unknown): e is MarginError {
	return e instanceof MarginError;
}

export function isPositionError(e: unknown): e is PositionError {
	return e instanceof PositionError;
}

export function isInvariantViolation(e: unknown): e is InvariantViolationError {
	return e instanceof InvariantViolationError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
