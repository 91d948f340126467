import { bench, describe } from "vitest";
import {
	type CollateralTokenConfig,
	FakeClock,
	InMemoryPriceSource,
	type TokenAddress,
	assetId,
	createPerpEngine,
	issueCredential,
	loadProtocolConfig,
	ok,
	primaryAccount,
	tokenAddress,
	unwrap,
	usd,
	walkTokens,
} from "../src/index.js";

const T0 = 1_700_002_800;
const USDC = tokenAddress("0x1000000000000000000000000000000000000001");
const WETH = tokenAddress("0x2000000000000000000000000000000000000002");
const WBTC = tokenAddress("0x3000000000000000000000000000000000000003");

const TOKENS: CollateralTokenConfig[] = [
	{ token: USDC, assetId: assetId("USDC"), decimals: 6, collateralFactorBps: 10_000, accepted: true },
	{ token: WETH, assetId: assetId("ETH"), decimals: 18, collateralFactorBps: 8_000, accepted: true },
	{ token: WBTC, assetId: assetId("BTC"), decimals: 8, collateralFactorBps: 8_000, accepted: true },
];

const PRICES = new Map([
	[assetId("USDC"), usd("1")],
	[assetId("ETH"), usd("2000")],
	[assetId("BTC"), usd("30000")],
]);

describe("token walk", () => {
	bench("drain two tokens, finish on the third", () => {
		const balances = new Map<TokenAddress, bigint>([
			[USDC, 100_000_000n],
			[WETH, 10n ** 17n],
			[WBTC, 10n ** 8n],
		]);
		walkTokens({
			owedE30: usd("1000"),
			tokens: TOKENS,
			source: {
				balanceOf: (token) => balances.get(token) ?? 0n,
				debit: (token, amount) => balances.set(token, (balances.get(token) ?? 0n) - amount),
			},
			prices: (asset) => ok(PRICES.get(asset) ?? usd("1")),
		});
	});
});

describe("trade round trip", () => {
	const clock = new FakeClock();
	clock.setSeconds(T0);
	const source = new InMemoryPriceSource();
	for (const [asset, price] of PRICES) source.setPrice(asset, price, T0);

	const engine = createPerpEngine({
		config: unwrap(
			loadProtocolConfig(
				{
					fundingIntervalSeconds: 3_600,
					devFeeRateBps: 1_500,
					pnlFactorBps: 10_000,
					liquidationFeeUsd: "5",
					oracle: { maxPriceAgeSeconds: 60, confidenceThresholdE6: 0 },
					collateralTokens: TOKENS,
					markets: [
						{
							marketIndex: 0,
							assetId: "ETH",
							assetClass: 0,
							initialMarginFractionBps: 100,
							maintenanceMarginFractionBps: 50,
							increasePositionFeeRateBps: 10,
							decreasePositionFeeRateBps: 10,
							maxFundingRate: "0.0004",
							maxSkewScaleUsd: "10000000",
							maxProfitRateBps: 90_000,
						},
					],
					assetClasses: [{ assetClass: 0, baseBorrowingRate: "0.0001" }],
				},
				{},
			),
		),
		priceSource: source,
		clock,
	});
	const executor = issueCredential("bench-executor");
	engine.allowlist.allow(engine.owner, executor);
	const trader = primaryAccount("0x00000000000000000000000000000000000a11ce");
	unwrap(
		engine.crossMargin.depositCollateral(executor, {
			primaryAccount: trader,
			subAccountId: 0,
			token: USDC,
			amount: 10n ** 15n,
		}),
	);

	bench("open and close a $10k long", () => {
		unwrap(
			engine.trade.increasePosition(executor, {
				primaryAccount: trader,
				subAccountId: 0,
				marketIndex: 0,
				sizeDeltaE30: usd("10000"),
			}),
		);
		unwrap(
			engine.trade.decreasePosition(executor, {
				primaryAccount: trader,
				subAccountId: 0,
				marketIndex: 0,
				sizeToDecreaseE30: usd("10000"),
			}),
		);
	});
});
