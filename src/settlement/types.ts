// What a committed settlement moved, leg by leg.

import type { SubAccount, TokenAddress } from "../shared/identifiers.js";
import type { PoolBucket } from "../storage/ledger-store.js";

/** One token drawn from a payer. `devFeeAmount` is zero for funding legs. */
export interface FeeLeg {
	readonly token: TokenAddress;
	readonly amount: bigint;
	readonly valueE30: bigint;
	readonly devFeeAmount: bigint;
}

/** Where collected tokens go. "fee" takes the dev cut first. */
export type SeizeDestination =
	| { readonly kind: "fee"; readonly bucket: "protocolFee" | "liquidity" }
	| { readonly kind: "funding" }
	| { readonly kind: "pool"; readonly bucket: PoolBucket }
	| { readonly kind: "trader"; readonly subAccount: SubAccount };

/** Tokens collected toward an amount, and the USD left uncollected. */
export interface Collection {
	readonly legs: readonly FeeLeg[];
	readonly coveredE30: bigint;
	readonly remainingE30: bigint;
}

export type FundingPayer = "trader" | "pool" | "none";

export interface SettlementReceipt {
	readonly subAccount: SubAccount;
	readonly marketIndex: number;
	readonly tradingFeeE30: bigint;
	readonly borrowingFeeE30: bigint;
	/** Signed, long perspective. */
	readonly fundingFeeE30: bigint;
	readonly fundingPayer: FundingPayer;
	readonly tradingLegs: readonly FeeLeg[];
	readonly borrowingLegs: readonly FeeLeg[];
	readonly fundingLegs: readonly FeeLeg[];
}
