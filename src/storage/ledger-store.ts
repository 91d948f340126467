/**
 * LedgerStore — per-token balance bookkeeping. No business logic.
 *
 * Trader side: collateral per (sub-account, token) and, per sub-account,
 * the set of tokens with a nonzero balance. Pool side: four per-token
 * buckets plus the scalar pool liquidity debt (USD E30). Every mutator
 * takes a caller credential checked against the shared Authorizer.
 */

import type { Authorizer, CallerCredential } from "../auth/types.js";
import { InvariantViolationError } from "../shared/errors.js";
import { checkedUint256 } from "../shared/fixed-point.js";
import type { SubAccount, TokenAddress } from "../shared/identifiers.js";
import type { UndoLog } from "./undo-log.js";

/** Pool-level per-token balances. */
export type PoolBucket = "liquidity" | "protocolFee" | "devFee" | "fundingFeeReserve";

function balanceKey(subAccount: SubAccount, token: TokenAddress): string {
	return `${subAccount}:${token}`;
}

export class LedgerStore {
	private readonly authorizer: Authorizer;
	private readonly undo: UndoLog;

	private readonly traderBalances = new Map<string, bigint>();
	private readonly traderTokenSets = new Map<SubAccount, Set<TokenAddress>>();
	private readonly pool: Record<PoolBucket, Map<TokenAddress, bigint>> = {
		liquidity: new Map(),
		protocolFee: new Map(),
		devFee: new Map(),
		fundingFeeReserve: new Map(),
	};
	private readonly debt = new Map<"pool", bigint>();
	private readonly badDebts = new Map<SubAccount, bigint>();

	constructor(authorizer: Authorizer, undo: UndoLog) {
		this.authorizer = authorizer;
		this.undo = undo;
	}

	// ── Reads ──────────────────────────────────────────────────────

	traderBalance(subAccount: SubAccount, token: TokenAddress): bigint {
		return this.traderBalances.get(balanceKey(subAccount, token)) ?? 0n;
	}

	/** Tokens the sub-account holds a nonzero balance of. */
	traderTokens(subAccount: SubAccount): readonly TokenAddress[] {
		return [...(this.traderTokenSets.get(subAccount) ?? [])];
	}

	hasTraderToken(subAccount: SubAccount, token: TokenAddress): boolean {
		return this.traderTokenSets.get(subAccount)?.has(token) ?? false;
	}

	poolBalance(bucket: PoolBucket, token: TokenAddress): bigint {
		return this.pool[bucket].get(token) ?? 0n;
	}

	poolLiquidity(token: TokenAddress): bigint {
		return this.poolBalance("liquidity", token);
	}

	protocolFees(token: TokenAddress): bigint {
		return this.poolBalance("protocolFee", token);
	}

	devFees(token: TokenAddress): bigint {
		return this.poolBalance("devFee", token);
	}

	fundingFeeReserve(token: TokenAddress): bigint {
		return this.poolBalance("fundingFeeReserve", token);
	}

	/** USD (E30) the pool owes funding payers but has not yet realized in kind. */
	poolLiquidityDebtUsd(): bigint {
		return this.debt.get("pool") ?? 0n;
	}

	/** Loss (USD E30) a liquidation could not recover from the sub-account. */
	badDebtUsd(subAccount: SubAccount): bigint {
		return this.badDebts.get(subAccount) ?? 0n;
	}

	// ── Trader balances ────────────────────────────────────────────

	/** Credits a trader and registers the token on its first nonzero balance. */
	increaseTraderBalance(
		caller: CallerCredential,
		subAccount: SubAccount,
		token: TokenAddress,
		amount: bigint,
	): void {
		this.authorizer.assertAuthorized(caller, "increaseTraderBalance");
		if (amount === 0n) return;
		const before = this.traderBalance(subAccount, token);
		this.writeTraderBalance(subAccount, token, add(before, amount, "traderBalance"));
		if (before === 0n) this.registerToken(subAccount, token);
	}

	/**
	 * Debits a trader and deregisters the token when the balance reaches zero.
	 * @throws InvariantViolationError InsufficientBalance when `amount` exceeds the balance
	 */
	decreaseTraderBalance(
		caller: CallerCredential,
		subAccount: SubAccount,
		token: TokenAddress,
		amount: bigint,
	): void {
		this.authorizer.assertAuthorized(caller, "decreaseTraderBalance");
		if (amount === 0n) return;
		const after = subtract(this.traderBalance(subAccount, token), amount, "traderBalance", {
			subAccount,
			token,
		});
		this.writeTraderBalance(subAccount, token, after);
		if (after === 0n) this.deregisterToken(subAccount, token);
	}

	/**
	 * Adds `token` to the sub-account's token set.
	 * @throws InvariantViolationError TokenAlreadyRegistered, ZeroBalanceRegistration
	 */
	addTraderToken(caller: CallerCredential, subAccount: SubAccount, token: TokenAddress): void {
		this.authorizer.assertAuthorized(caller, "addTraderToken");
		if (this.hasTraderToken(subAccount, token)) {
			throw new InvariantViolationError(
				"TokenAlreadyRegistered",
				"Token is already in the trader's token set",
				{ subAccount, token },
			);
		}
		if (this.traderBalance(subAccount, token) === 0n) {
			throw new InvariantViolationError(
				"ZeroBalanceRegistration",
				"Cannot register a token with zero balance",
				{ subAccount, token },
			);
		}
		this.registerToken(subAccount, token);
	}

	/**
	 * Removes `token` from the sub-account's token set.
	 * @throws InvariantViolationError TokenNotRegistered, TokenBalanceNotZero
	 */
	removeTraderToken(caller: CallerCredential, subAccount: SubAccount, token: TokenAddress): void {
		this.authorizer.assertAuthorized(caller, "removeTraderToken");
		if (!this.hasTraderToken(subAccount, token)) {
			throw new InvariantViolationError(
				"TokenNotRegistered",
				"Token is not in the trader's token set",
				{ subAccount, token },
			);
		}
		if (this.traderBalance(subAccount, token) !== 0n) {
			throw new InvariantViolationError(
				"TokenBalanceNotZero",
				"Cannot remove a token with a nonzero balance",
				{ subAccount, token, balance: this.traderBalance(subAccount, token) },
			);
		}
		this.deregisterToken(subAccount, token);
	}

	// ── Pool balances ──────────────────────────────────────────────

	increasePoolBalance(
		caller: CallerCredential,
		bucket: PoolBucket,
		token: TokenAddress,
		amount: bigint,
	): void {
		this.authorizer.assertAuthorized(caller, "increasePoolBalance");
		if (amount === 0n) return;
		const next = add(this.poolBalance(bucket, token), amount, bucket);
		this.undo.setEntry(this.pool[bucket], token, next);
	}

	/** @throws InvariantViolationError InsufficientBalance */
	decreasePoolBalance(
		caller: CallerCredential,
		bucket: PoolBucket,
		token: TokenAddress,
		amount: bigint,
	): void {
		this.authorizer.assertAuthorized(caller, "decreasePoolBalance");
		if (amount === 0n) return;
		const next = subtract(this.poolBalance(bucket, token), amount, bucket, { bucket, token });
		this.undo.setEntry(this.pool[bucket], token, next);
	}

	increasePoolLiquidityDebt(caller: CallerCredential, amountUsdE30: bigint): void {
		this.authorizer.assertAuthorized(caller, "increasePoolLiquidityDebt");
		if (amountUsdE30 === 0n) return;
		this.undo.setEntry(
			this.debt,
			"pool",
			add(this.poolLiquidityDebtUsd(), amountUsdE30, "poolLiquidityDebt"),
		);
	}

	/** @throws InvariantViolationError InsufficientBalance when repaying more than is owed */
	decreasePoolLiquidityDebt(caller: CallerCredential, amountUsdE30: bigint): void {
		this.authorizer.assertAuthorized(caller, "decreasePoolLiquidityDebt");
		if (amountUsdE30 === 0n) return;
		this.undo.setEntry(
			this.debt,
			"pool",
			subtract(this.poolLiquidityDebtUsd(), amountUsdE30, "poolLiquidityDebt", {}),
		);
	}

	addBadDebt(caller: CallerCredential, subAccount: SubAccount, amountUsdE30: bigint): void {
		this.authorizer.assertAuthorized(caller, "addBadDebt");
		if (amountUsdE30 === 0n) return;
		this.undo.setEntry(
			this.badDebts,
			subAccount,
			add(this.badDebtUsd(subAccount), amountUsdE30, "badDebt"),
		);
	}

	// ── Internals ──────────────────────────────────────────────────

	private writeTraderBalance(subAccount: SubAccount, token: TokenAddress, value: bigint): void {
		this.undo.setEntry(
			this.traderBalances,
			balanceKey(subAccount, token),
			value === 0n ? undefined : value,
		);
	}

	private registerToken(subAccount: SubAccount, token: TokenAddress): void {
		let tokens = this.traderTokenSets.get(subAccount);
		if (!tokens) {
			tokens = new Set();
			this.undo.setEntry(this.traderTokenSets, subAccount, tokens);
		}
		this.undo.addMember(tokens, token);
	}

	private deregisterToken(subAccount: SubAccount, token: TokenAddress): void {
		const tokens = this.traderTokenSets.get(subAccount);
		if (tokens) this.undo.deleteMember(tokens, token);
	}
}

function add(a: bigint, b: bigint, label: string): bigint {
	if (b < 0n) throw new RangeError(`${label}: negative increment ${b}`);
	return checkedUint256(a + b, label);
}

function subtract(a: bigint, b: bigint, label: string, context: Record<string, unknown>): bigint {
	if (b < 0n) throw new RangeError(`${label}: negative decrement ${b}`);
	if (b > a) {
		throw new InvariantViolationError("InsufficientBalance", `${label} would go below zero`, {
			...context,
			balance: a,
			amount: b,
		});
	}
	return a - b;
}
