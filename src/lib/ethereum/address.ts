/**
 * Ethereum address and hashing wrapper — abstracts viem's hex utilities
 * behind plain string-in / string-out helpers. Domain code never imports
 * viem directly.
 */

import { encodePacked, getAddress, hexToBigInt, isAddress, keccak256, numberToHex } from "viem";

const MAX_SUB_ACCOUNT_ID = 255;

/**
 * Returns the EIP-55 checksummed form of an address.
 * @throws Error if the input is not a 20-byte hex address
 * @example checksumAddress("0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266")
 */
export function checksumAddress(value: string): string {
	const trimmed = value.trim();
	if (!isAddress(trimmed, { strict: false })) {
		throw new Error(`Invalid address: ${trimmed}`);
	}
	return getAddress(trimmed);
}

/**
 * XORs the low byte of an address with a sub-account id (0-255).
 * Sub-account 0 is the primary account itself.
 */
export function xorSubAccount(primary: string, subAccountId: number): string {
	if (!Number.isInteger(subAccountId) || subAccountId < 0 || subAccountId > MAX_SUB_ACCOUNT_ID) {
		throw new Error(`Sub-account id must be an integer in [0, ${MAX_SUB_ACCOUNT_ID}]`);
	}
	const base = hexToBigInt(getAddress(checksumAddress(primary)));
	return getAddress(numberToHex(base ^ BigInt(subAccountId), { size: 20 }));
}

/** keccak256(abi.encodePacked(address, uint256)) as a 0x-prefixed hex string. */
export function hashAddressWithIndex(address: string, index: number): string {
	return keccak256(
		encodePacked(["address", "uint256"], [getAddress(checksumAddress(address)), BigInt(index)]),
	);
}
