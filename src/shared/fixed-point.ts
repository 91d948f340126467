/**
 * Fixed-point arithmetic on bigint.
 *
 * Scales used across the engine:
 * - USD values and prices: 30 decimals (E30)
 * - funding / borrowing rates: 18 decimals (RATE_PRECISION)
 * - fee and margin fractions: basis points (BPS)
 * - token amounts: the token's own decimals
 *
 * bigint never wraps, so the int256/uint256 range is enforced explicitly
 * wherever a value is persisted.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import { InvariantViolationError } from "./errors.js";

export const USD_DECIMALS = 30;
export const RATE_DECIMALS = 18;

export const E30 = 10n ** 30n;
export const RATE_PRECISION = 10n ** 18n;
export const BPS = 10_000n;

export const MAX_UINT256 = 2n ** 256n - 1n;
export const MAX_INT256 = 2n ** 255n - 1n;
export const MIN_INT256 = -(2n ** 255n);

export type Rounding = "floor" | "ceil";

// ── Range checks ─────────────────────────────────────────────────────

/** Throws ArithmeticOverflow unless 0 <= value <= 2^256-1. */
export function checkedUint256(value: bigint, label = "value"): bigint {
	if (value < 0n || value > MAX_UINT256) {
		throw new InvariantViolationError("ArithmeticOverflow", `${label} outside uint256 range`, {
			value,
		});
	}
	return value;
}

/** Throws ArithmeticOverflow unless value fits in int256. */
export function checkedInt256(value: bigint, label = "value"): bigint {
	if (value < MIN_INT256 || value > MAX_INT256) {
		throw new InvariantViolationError("ArithmeticOverflow", `${label} outside int256 range`, {
			value,
		});
	}
	return value;
}

// ── Arithmetic ───────────────────────────────────────────────────────

/**
 * Computes a * b / d. Floor rounds toward negative infinity, ceil toward
 * positive infinity.
 * @throws Error on division by zero
 * @example mulDiv(500n * E30, 10n ** 18n, 2000n * E30, "ceil") // 0.25e18
 */
export function mulDiv(a: bigint, b: bigint, d: bigint, rounding: Rounding = "floor"): bigint {
	if (d === 0n) {
		throw new Error("mulDiv: division by zero");
	}
	const n = a * b;
	const q = n / d;
	const r = n % d;
	if (r === 0n) return q;
	const negative = n < 0n !== d < 0n;
	if (rounding === "floor" && negative) return q - 1n;
	if (rounding === "ceil" && !negative) return q + 1n;
	return q;
}

export function abs(value: bigint): bigint {
	return value < 0n ? -value : value;
}

export function min(a: bigint, b: bigint): bigint {
	return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
	return a > b ? a : b;
}

export function clamp(value: bigint, lo: bigint, hi: bigint): bigint {
	return max(lo, min(hi, value));
}

export function sign(value: bigint): -1n | 0n | 1n {
	if (value > 0n) return 1n;
	if (value < 0n) return -1n;
	return 0n;
}

/** value × bps / 10 000, floored. */
export function applyBps(value: bigint, bps: bigint | number): bigint {
	return mulDiv(value, BigInt(bps), BPS);
}

// ── USD ⇄ token conversion ───────────────────────────────────────────

/**
 * USD (E30) to a token amount at `priceE30`. Rounds up by default so a
 * trader paying in never covers less than the USD owed.
 */
export function usdToTokenAmount(
	usdE30: bigint,
	priceE30: bigint,
	decimals: number,
	rounding: Rounding = "ceil",
): bigint {
	return mulDiv(usdE30, 10n ** BigInt(decimals), priceE30, rounding);
}

/** Token amount to its USD (E30) value at `priceE30`, rounded down by default. */
export function tokenAmountToUsd(
	amount: bigint,
	priceE30: bigint,
	decimals: number,
	rounding: Rounding = "floor",
): bigint {
	return mulDiv(amount, priceE30, 10n ** BigInt(decimals), rounding);
}

// ── Decimal strings ──────────────────────────────────────────────────

/**
 * Parses a decimal string into an integer with `decimals` implied digits.
 * @throws Error when the value carries more precision than `decimals` allows
 * @example parseUnits("9.75", 18) // 9750000000000000000n
 * @example usd("2000") // 2000n * E30
 */
export function parseUnits(value: string | number, decimals: number): bigint {
	const parsed = LibDecimal.from(value);
	if (parsed.exceedsPrecision(decimals)) {
		throw new Error(`parseUnits: ${parsed.toString()} has more than ${decimals} decimals`);
	}
	return parsed.toScaled(decimals);
}

/**
 * Renders a scaled integer as a decimal string without trailing zeros.
 * @example formatUnits(250000n, 6) // "0.25"
 */
export function formatUnits(value: bigint, decimals: number): string {
	return LibDecimal.fromScaled(value, decimals).toString();
}

/** Shorthand for a USD value at E30. */
export function usd(value: string | number): bigint {
	return parseUnits(value, USD_DECIMALS);
}

/** Shorthand for a per-interval rate at 1e18. */
export function rate(value: string | number): bigint {
	return parseUnits(value, RATE_DECIMALS);
}

export function formatUsd(valueE30: bigint): string {
	return formatUnits(valueE30, USD_DECIMALS);
}
