/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Used only at the edges: parsing human-entered decimal strings into
 * scaled integers and rendering scaled integers back for logs and config.
 * Settlement math itself runs on bigint (see shared/fixed-point).
 */
import decimalLight, { type Decimal as DecimalLight } from "decimal.js-light";

// The package is CommonJS; its constructor hangs off the default export.
const { Decimal } = decimalLight;

// 78 digits covers the full uint256 range with room for the fractional part.
const Precise = Decimal.clone({ precision: 100, rounding: Decimal.ROUND_DOWN });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers), empty, or malformed
	 * @example LibDecimal.from("1e-4")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new Precise(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		try {
			return new LibDecimal(new Precise(trimmed));
		} catch {
			throw new Error(`LibDecimal.from: malformed decimal "${trimmed}"`);
		}
	}

	/**
	 * Interprets an integer as a value with `decimals` implied fraction digits.
	 * @example LibDecimal.fromScaled(1500000n, 6).toString() // "1.5"
	 */
	static fromScaled(value: bigint, decimals: number): LibDecimal {
		return new LibDecimal(new Precise(value.toString()).dividedBy(new Precise(10).pow(decimals)));
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Scales by 10^decimals and truncates toward zero.
	 * @example LibDecimal.from("0.25").toScaled(18) // 250000000000000000n
	 */
	toScaled(decimals: number): bigint {
		const scaled = this.raw.times(new Precise(10).pow(decimals));
		return BigInt(scaled.toFixed(0, Decimal.ROUND_DOWN));
	}

	/** True when the value has more fraction digits than `decimals` can hold. */
	exceedsPrecision(decimals: number): boolean {
		return this.raw.decimalPlaces() > decimals;
	}

	isNegative(): boolean {
		return this.raw.isNegative() && !this.raw.isZero();
	}

	/**
	 * Converts to a string without trailing zeros or a dangling decimal point.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/**
	 * Converts to a fixed-point string with the given number of places (truncated).
	 * @example LibDecimal.from("1.23456").toFixed(2) // "1.23"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places, Decimal.ROUND_DOWN);
	}
}
