/**
 * OracleGateway — validated price reads for the settlement core.
 *
 * Every read runs the same gate, in order: the asset must have a price,
 * its market must be open, the price must be fresh, positive and, when a
 * threshold is given, tight enough. A failed gate is returned, never
 * retried.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { OracleError } from "../shared/errors.js";
import { mulDiv } from "../shared/fixed-point.js";
import type { AssetId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, unixSeconds } from "../shared/time.js";
import { passThroughPricer } from "./adaptive-pricer.js";
import type { AdaptivePricer, PriceQuote, PriceSource } from "./types.js";

const CONFIDENCE_PRECISION = 1_000_000n;

export interface OracleGatewayOptions {
	readonly adaptivePricer?: AdaptivePricer;
	readonly logger?: Logger;
}

/** Skew context for getAdaptivePrice(). USD E30. */
export interface SkewContext {
	readonly skewE30: bigint;
	readonly sizeDeltaE30: bigint;
	readonly maxSkewScaleE30: bigint;
}

export class OracleGateway {
	private readonly source: PriceSource;
	private readonly clock: Clock;
	private readonly pricer: AdaptivePricer;
	private readonly logger: Logger;

	private constructor(source: PriceSource, clock: Clock, options: OracleGatewayOptions) {
		this.source = source;
		this.clock = clock;
		this.pricer = options.adaptivePricer ?? passThroughPricer;
		this.logger = (options.logger ?? silentLogger()).child({ module: "oracle" });
	}

	static create(
		source: PriceSource,
		clock: Clock,
		options: OracleGatewayOptions = {},
	): OracleGateway {
		return new OracleGateway(source, clock, options);
	}

	/**
	 * Reads a price, biased by its confidence interval: up when `isMax`,
	 * down otherwise.
	 *
	 * @param confidenceThresholdE6 - max confidence / price in ppm; 0 disables
	 * @param maxAgeSeconds - oldest acceptable publish time, relative to now
	 */
	getPrice(
		asset: AssetId,
		isMax: boolean,
		confidenceThresholdE6: number,
		maxAgeSeconds: number,
	): Result<PriceQuote, OracleError> {
		const record = this.source.read(asset);
		if (!record) {
			return this.reject("PriceNotFound", `No price for ${asset}`, { asset });
		}

		const status = this.source.marketStatus(asset);
		if (status === "undefined") {
			return this.reject("MarketStatusUndefined", `Market status for ${asset} is undefined`, {
				asset,
			});
		}
		if (status === "inactive") {
			return this.reject("MarketClosed", `Market for ${asset} is closed`, { asset });
		}

		const age = unixSeconds(this.clock) - record.publishTime;
		if (age > maxAgeSeconds) {
			return this.reject("PriceStale", `Price for ${asset} is ${age}s old`, {
				asset,
				age,
				maxAgeSeconds,
			});
		}

		if (record.priceE30 <= 0n) {
			return this.reject("InvalidPrice", `Price for ${asset} is not positive`, {
				asset,
				priceE30: record.priceE30,
			});
		}

		if (confidenceThresholdE6 > 0) {
			const ratio = mulDiv(record.confidenceE30, CONFIDENCE_PRECISION, record.priceE30);
			if (ratio > BigInt(confidenceThresholdE6)) {
				return this.reject("PriceConfidenceExceeded", `Price for ${asset} is too uncertain`, {
					asset,
					ratio,
					confidenceThresholdE6,
				});
			}
		}

		const priceE30 = isMax
			? record.priceE30 + record.confidenceE30
			: record.priceE30 - record.confidenceE30;
		if (priceE30 <= 0n) {
			return this.reject("InvalidPrice", `Price for ${asset} is not positive after confidence`, {
				asset,
				priceE30,
			});
		}
		return ok({ priceE30, lastUpdateTime: record.publishTime });
	}

	/**
	 * Like getPrice(), then adjusted by the configured AdaptivePricer for the
	 * market's skew and the trade's size.
	 */
	getAdaptivePrice(
		asset: AssetId,
		isMax: boolean,
		skew: SkewContext,
		confidenceThresholdE6: number,
		maxAgeSeconds: number,
	): Result<PriceQuote, OracleError> {
		const quote = this.getPrice(asset, isMax, confidenceThresholdE6, maxAgeSeconds);
		if (!quote.ok) return quote;

		const adjusted = this.pricer.adjust({ priceE30: quote.value.priceE30, ...skew });
		if (adjusted <= 0n) {
			return this.reject("InvalidPrice", `Adaptive price for ${asset} is not positive`, {
				asset,
				priceE30: adjusted,
			});
		}
		return ok({ priceE30: adjusted, lastUpdateTime: quote.value.lastUpdateTime });
	}

	private reject(
		code: OracleError["code"],
		message: string,
		context: Record<string, unknown>,
	): Result<never, OracleError> {
		this.logger.warn({ code, ...context }, message);
		return err(new OracleError(code, message, context));
	}
}
