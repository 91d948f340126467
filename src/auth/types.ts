/**
 * Store mutations are gated by capability: a caller proves it may write by
 * presenting a credential object the allow-list has admitted, not by an
 * address or name comparison.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Domain types ─────────────────────────────────────────────────────

/**
 * Opaque caller capability. Renders as "[REDACTED]" through toString,
 * JSON.stringify and Node.js inspect; its label is only reachable through
 * credentialLabel().
 */
export type CallerCredential = Brand<{ readonly __opaque: true }, "CallerCredential">;

/** Authorization predicate consulted by every mutating store entry point. */
export interface Authorizer {
	isAuthorized(caller: CallerCredential): boolean;
	/** Throws AuthorizationError("NotWhitelisted") unless the caller is admitted. */
	assertAuthorized(caller: CallerCredential, action: string): void;
}
