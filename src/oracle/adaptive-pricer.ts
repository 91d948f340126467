/**
 * Adaptive pricers for OracleGateway.getAdaptivePrice().
 *
 * The gateway only needs some function from (price, skew, size) to price;
 * which premium curve a deployment uses is its own business.
 */

import { mulDiv } from "../shared/fixed-point.js";
import type { AdaptivePriceInput, AdaptivePricer } from "./types.js";

/** Returns the oracle price untouched. */
export const passThroughPricer: AdaptivePricer = {
	adjust: ({ priceE30 }) => priceE30,
};

/**
 * Linear skew premium: the price moves by the average of the premium before
 * and after the trade, where premium = skew / maxSkewScale.
 *
 * @example
 * ```ts
 * // skew 0, +$100k trade, $10M scale -> premium 0.5%
 * linearSkewPricer().adjust({
 *   priceE30: usd("2000"), skewE30: 0n,
 *   sizeDeltaE30: usd("100000"), maxSkewScaleE30: usd("10000000"),
 * }); // usd("2010")
 * ```
 */
export function linearSkewPricer(): AdaptivePricer {
	return {
		adjust({ priceE30, skewE30, sizeDeltaE30, maxSkewScaleE30 }) {
			if (maxSkewScaleE30 <= 0n) return priceE30;
			const premium = mulDiv(priceE30, 2n * skewE30 + sizeDeltaE30, 2n * maxSkewScaleE30);
			return priceE30 + premium;
		},
	};
}
