/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing a TokenAddress where a SubAccount is expected).
 */

import { checksumAddress, hashAddressWithIndex, xorSubAccount } from "../lib/ethereum/index.js";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Wallet that owns sub-accounts. */
export type PrimaryAccount = Brand<string, "PrimaryAccount">;
/** Primary account XOR sub-account id; the unit balances and positions are keyed by. */
export type SubAccount = Brand<string, "SubAccount">;
/** ERC-20 style collateral token address. */
export type TokenAddress = Brand<string, "TokenAddress">;
/** Oracle asset identifier, e.g. "ETH" or "USDC". */
export type AssetId = Brand<string, "AssetId">;
/** keccak256(subAccount, marketIndex). */
export type PositionId = Brand<string, "PositionId">;

// ── Factory functions with validation ────────────────────────────────

function brandAddress<B extends string>(value: string, label: B): Brand<string, B> {
	try {
		return checksumAddress(value) as Brand<string, B>;
	} catch {
		throw new Error(`${label} must be a 20-byte hex address, got: ${value}`);
	}
}

/** Create a checksummed PrimaryAccount. Throws on malformed input. */
export function primaryAccount(value: string): PrimaryAccount {
	return brandAddress(value, "PrimaryAccount");
}

/** Create a checksummed TokenAddress. Throws on malformed input. */
export function tokenAddress(value: string): TokenAddress {
	return brandAddress(value, "TokenAddress");
}

/** Create a validated AssetId. Throws if empty. */
export function assetId(value: string): AssetId {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("AssetId cannot be empty");
	}
	return trimmed as AssetId;
}

/**
 * Derive the sub-account for a primary account and sub-account id (0-255).
 * @example subAccountOf(primary, 0) === primary
 */
export function subAccountOf(primary: PrimaryAccount, subAccountId: number): SubAccount {
	return xorSubAccount(primary, subAccountId) as SubAccount;
}

/** Derive the position id for a sub-account's position in a market. */
export function positionIdOf(subAccount: SubAccount, marketIndex: number): PositionId {
	if (!Number.isInteger(marketIndex) || marketIndex < 0) {
		throw new Error(`marketIndex must be a non-negative integer, got: ${marketIndex}`);
	}
	return hashAddressWithIndex(subAccount, marketIndex) as PositionId;
}
