import { describe, expect, it } from "vitest";
import { ALICE, ALICE_SUB, ETH, T0, USDC, USDC_ASSET, rawConfig } from "../__tests__/harness.js";
import { issueCredential } from "../auth/credentials.js";
import { loadProtocolConfig } from "../config/loader.js";
import { createLogger } from "../lib/logger/index.js";
import { linearSkewPricer } from "../oracle/adaptive-pricer.js";
import { InMemoryPriceSource } from "../oracle/memory-price-source.js";
import { AuthorizationError } from "../shared/errors.js";
import { usd } from "../shared/fixed-point.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { createPerpEngine } from "./engine.js";

function setup(options: { withPricer?: boolean } = {}) {
	const clock = new FakeClock();
	clock.setSeconds(T0);
	const source = new InMemoryPriceSource();
	source.setPrice(USDC_ASSET, usd("1"), T0);
	source.setPrice(ETH, usd("2000"), T0);

	const lines: string[] = [];
	const owner = issueCredential("test-owner");
	const engine = createPerpEngine({
		config: unwrap(loadProtocolConfig(rawConfig(), {})),
		priceSource: source,
		clock,
		owner,
		logger: createLogger({
			level: "info",
			destination: {
				write(msg: string) {
					lines.push(msg);
				},
			},
		}),
		...(options.withPricer ? { adaptivePricer: linearSkewPricer() } : {}),
	});
	const executor = issueCredential("order-executor");
	engine.allowlist.allow(owner, executor);
	return { engine, owner, executor, lines };
}

const deposit = { primaryAccount: ALICE, subAccountId: 0, token: USDC, amount: 5_000_000_000n };

describe("createPerpEngine", () => {
	it("uses the supplied owner for configuration", () => {
		const { engine, owner } = setup();

		engine.config.setDevFeeRateBps(owner, 1_000);

		expect(engine.owner).toBe(owner);
		expect(engine.config.devFeeRateBps()).toBe(1_000);
	});

	it("only serves callers the owner admitted", () => {
		const { engine } = setup();

		expect(() =>
			engine.crossMargin.depositCollateral(issueCredential("stranger"), deposit),
		).toThrow(AuthorizationError);
		expect(engine.ledger.traderBalance(ALICE_SUB, USDC)).toBe(0n);
	});

	it("writes service activity through the supplied logger", () => {
		const { engine, executor, lines } = setup();

		engine.crossMargin.depositCollateral(executor, deposit);

		const line: Record<string, unknown> = JSON.parse(lines.at(-1) ?? "{}");
		expect(line["module"]).toBe("cross-margin");
		expect(line["msg"]).toBe("collateral deposited");
		expect(line["amount"]).toBe("5000000000");
	});

	it("fills trades through the supplied adaptive pricer", () => {
		const { engine, executor } = setup({ withPricer: true });
		engine.crossMargin.depositCollateral(executor, deposit);

		const result = engine.trade.increasePosition(executor, {
			primaryAccount: ALICE,
			subAccountId: 0,
			marketIndex: 0,
			sizeDeltaE30: usd("100000"),
		});

		// zero skew, $100k against a $10M scale: half of 1% premium
		expect(result.ok && result.value.fillPriceE30).toBe(usd("2010"));
	});
});
