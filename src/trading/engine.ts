/**
 * createPerpEngine — wires stores, oracle, calculators, settlement and the
 * trading services over one undo log.
 *
 * @example
 * ```ts
 * const engine = createPerpEngine({ config, priceSource });
 * const executor = issueCredential("order-executor");
 * engine.allowlist.allow(engine.owner, executor);
 * engine.crossMargin.depositCollateral(executor, { primaryAccount, subAccountId: 0, token, amount });
 * ```
 */

import { Allowlist } from "../auth/access-control.js";
import { issueCredential } from "../auth/credentials.js";
import type { CallerCredential } from "../auth/types.js";
import { MarginCalculator } from "../calculator/margin-calculator.js";
import { type PriceReader, oraclePriceReader } from "../calculator/price-reader.js";
import { RateCalculator } from "../calculator/rate-calculator.js";
import { ConfigStore } from "../config/config-store.js";
import type { ProtocolConfig } from "../config/types.js";
import type { Logger } from "../lib/logger/index.js";
import { OracleGateway } from "../oracle/oracle-gateway.js";
import type { AdaptivePricer, PriceSource } from "../oracle/types.js";
import { FeeSettlementEngine } from "../settlement/fee-settlement.js";
import { RateAccumulator } from "../settlement/rate-accumulator.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { LedgerStore } from "../storage/ledger-store.js";
import { PositionStore } from "../storage/position-store.js";
import { UndoLog } from "../storage/undo-log.js";
import { CrossMarginService } from "./cross-margin-service.js";
import { type EngineEvents, createEngineEvents } from "./events.js";
import { LiquidationService } from "./liquidation-service.js";
import { TradeService } from "./trade-service.js";

export interface PerpEngineOptions {
	readonly config: ProtocolConfig;
	readonly priceSource: PriceSource;
	readonly clock?: Clock;
	/** Owner credential for the allow-list and config setters; issued when absent. */
	readonly owner?: CallerCredential;
	readonly adaptivePricer?: AdaptivePricer;
	readonly logger?: Logger;
}

export interface PerpEngine {
	readonly owner: CallerCredential;
	readonly allowlist: Allowlist;
	readonly undo: UndoLog;
	readonly ledger: LedgerStore;
	readonly positions: PositionStore;
	readonly config: ConfigStore;
	readonly oracle: OracleGateway;
	readonly prices: PriceReader;
	readonly rates: RateCalculator;
	readonly margin: MarginCalculator;
	readonly fees: FeeSettlementEngine;
	readonly accumulator: RateAccumulator;
	readonly events: EngineEvents;
	readonly trade: TradeService;
	readonly crossMargin: CrossMarginService;
	readonly liquidation: LiquidationService;
}

export function createPerpEngine(options: PerpEngineOptions): PerpEngine {
	const clock = options.clock ?? SystemClock;
	const owner = options.owner ?? issueCredential("owner");
	const logging = options.logger ? { logger: options.logger } : {};

	// The engine writes to its own stores under one internal credential.
	const credential = issueCredential("perp-engine");
	const allowlist = new Allowlist(owner);
	allowlist.allow(owner, credential);

	const undo = new UndoLog();
	const ledger = new LedgerStore(allowlist, undo);
	const positions = new PositionStore(allowlist, undo);
	const config = new ConfigStore(options.config, allowlist);
	const oracle = OracleGateway.create(options.priceSource, clock, {
		...logging,
		...(options.adaptivePricer ? { adaptivePricer: options.adaptivePricer } : {}),
	});
	const prices = oraclePriceReader(oracle, config);
	const rates = new RateCalculator(ledger, positions, config, prices);
	const margin = new MarginCalculator(ledger, positions, config, prices);
	const fees = new FeeSettlementEngine({
		ledger,
		positions,
		config,
		prices,
		undo,
		credential,
		...logging,
	});
	const accumulator = new RateAccumulator({
		positions,
		config,
		calculator: rates,
		prices,
		clock,
		credential,
		...logging,
	});
	const events = createEngineEvents(options.logger);

	const services = { authorizer: allowlist, undo, credential, events, ...logging };
	return {
		owner,
		allowlist,
		undo,
		ledger,
		positions,
		config,
		oracle,
		prices,
		rates,
		margin,
		fees,
		accumulator,
		events,
		trade: new TradeService({
			...services,
			positions,
			config,
			oracle,
			accumulator,
			fees,
			margin,
			clock,
		}),
		crossMargin: new CrossMarginService({ ...services, ledger, config, margin }),
		liquidation: new LiquidationService({
			...services,
			ledger,
			positions,
			config,
			accumulator,
			fees,
			margin,
		}),
	};
}
