/**
 * Allowlist — the authorization capability shared by every store.
 *
 * One owner credential administers the list; any admitted credential may
 * call store mutators. Membership is tracked by object identity.
 */

import { AuthorizationError } from "../shared/errors.js";
import { credentialLabel, isIssuedCredential } from "./credentials.js";
import type { Authorizer, CallerCredential } from "./types.js";

export class Allowlist implements Authorizer {
	private readonly owner: CallerCredential;
	private readonly admitted = new WeakSet<CallerCredential>();

	constructor(owner: CallerCredential) {
		if (!isIssuedCredential(owner)) {
			throw new AuthorizationError("NotOwner", "Owner must be an issued credential");
		}
		this.owner = owner;
	}

	/** Admit `caller` to store mutations. Owner only. */
	allow(owner: CallerCredential, caller: CallerCredential): void {
		this.assertOwner(owner, "allow");
		if (!isIssuedCredential(caller)) {
			throw new AuthorizationError("NotWhitelisted", "Cannot admit an unissued credential");
		}
		this.admitted.add(caller);
	}

	/** Withdraw a previously admitted caller. Owner only. */
	revoke(owner: CallerCredential, caller: CallerCredential): void {
		this.assertOwner(owner, "revoke");
		this.admitted.delete(caller);
	}

	isAuthorized(caller: CallerCredential): boolean {
		return this.admitted.has(caller);
	}

	isOwner(caller: CallerCredential): boolean {
		return caller === this.owner;
	}

	assertAuthorized(caller: CallerCredential, action: string): void {
		if (!this.isAuthorized(caller)) {
			throw new AuthorizationError("NotWhitelisted", `Caller is not whitelisted for ${action}`, {
				action,
				caller: isIssuedCredential(caller) ? credentialLabel(caller) : "unknown",
			});
		}
	}

	assertOwner(caller: CallerCredential, action: string): void {
		if (!this.isOwner(caller)) {
			throw new AuthorizationError("NotOwner", `Only the owner may ${action}`, { action });
		}
	}
}
