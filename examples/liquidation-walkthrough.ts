/**
 * Liquidation walkthrough — opens a thinly margined ETH long, moves the
 * price against it and liquidates the account.
 *
 * Loads config/protocol.json; PERP_* environment overrides apply.
 * Run: npx tsx examples/liquidation-walkthrough.ts
 */

import { fileURLToPath } from "node:url";
import {
	FakeClock,
	InMemoryPriceSource,
	assetId,
	createLogger,
	createPerpEngine,
	formatUsd,
	issueCredential,
	loadProtocolConfigFile,
	primaryAccount,
	subAccountOf,
	tokenAddress,
	unixSeconds,
	unwrap,
	usd,
} from "../src/index.js";

const USDC = tokenAddress("0x1000000000000000000000000000000000000001");
const ETH = assetId("ETH");
const TRADER = primaryAccount("0x00000000000000000000000000000000000a11ce");
const KEEPER = primaryAccount("0x0000000000000000000000000000000000000b0b");

const logger = createLogger({ level: "info" });
const config = unwrap(
	await loadProtocolConfigFile(fileURLToPath(new URL("../config/protocol.json", import.meta.url))),
);

const clock = new FakeClock(Date.now());
const source = new InMemoryPriceSource();
function publish(ethPrice: string): void {
	source.setPrice(assetId("USDC"), usd("1"), unixSeconds(clock));
	source.setPrice(ETH, usd(ethPrice), unixSeconds(clock));
}
publish("2000");

const engine = createPerpEngine({ config, priceSource: source, clock, logger });
const keeper = issueCredential("keeper");
engine.allowlist.allow(engine.owner, keeper);
engine.ledger.increasePoolBalance(keeper, "liquidity", USDC, 100_000_000_000n);

// ── Open: 150 USDC backing a $10k long ──────────────────────────────

unwrap(
	engine.crossMargin.depositCollateral(keeper, {
		primaryAccount: TRADER,
		subAccountId: 0,
		token: USDC,
		amount: 150_000_000n,
	}),
);
const opened = unwrap(
	engine.trade.increasePosition(keeper, {
		primaryAccount: TRADER,
		subAccountId: 0,
		marketIndex: 0,
		sizeDeltaE30: usd("10000"),
	}),
);
logger.info(
	{
		equityUsd: formatUsd(opened.health.equityE30),
		mmrUsd: formatUsd(opened.health.maintenanceMarginRequiredE30),
	},
	"position opened",
);

// ── Price falls 1%: equity drops below maintenance margin ───────────

clock.advance(30_000);
publish("1980");

const result = engine.liquidation.liquidate(
	keeper,
	subAccountOf(TRADER, 0),
	subAccountOf(KEEPER, 0),
);
if (!result.ok) {
	logger.warn({ code: result.error.code }, "liquidation rejected");
} else {
	logger.info(
		{
			liquidationFeeUsd: formatUsd(result.value.liquidationFeeE30),
			badDebtUsd: formatUsd(result.value.badDebtE30),
			keeperUsdc: engine.ledger.traderBalance(subAccountOf(KEEPER, 0), USDC),
		},
		"account liquidated",
	);
}
