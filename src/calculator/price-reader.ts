/**
 * The view of the oracle the calculators use. Staleness and confidence
 * limits come from protocol config.
 */

import type { ConfigStore } from "../config/config-store.js";
import type { OracleGateway } from "../oracle/oracle-gateway.js";
import type { OracleError } from "../shared/errors.js";
import type { AssetId } from "../shared/identifiers.js";
import { type Result, map } from "../shared/result.js";

/** Reads an asset's USD price (E30): the upper bound when `isMax`, else the lower. */
export type PriceReader = (asset: AssetId, isMax: boolean) => Result<bigint, OracleError>;

export function oraclePriceReader(oracle: OracleGateway, config: ConfigStore): PriceReader {
	return (asset, isMax) => {
		const { confidenceThresholdE6, maxPriceAgeSeconds } = config.oracle();
		return map(
			oracle.getPrice(asset, isMax, confidenceThresholdE6, maxPriceAgeSeconds),
			(quote) => quote.priceE30,
		);
	};
}
