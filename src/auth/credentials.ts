/**
 * Opaque caller credentials — unforgeable capability objects whose label
 * never leaks through toString, JSON.stringify, or Node.js inspect.
 */

import { AuthorizationError } from "../shared/errors.js";
import type { CallerCredential } from "./types.js";

// ── Private store ────────────────────────────────────────────────────

const labels = new WeakMap<object, string>();

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Issues a new credential. Two credentials with the same label are still
 * distinct capabilities.
 *
 * @param label - Human-readable name used by credentialLabel() for diagnostics
 * @example
 * const tradeService = issueCredential("trade-service");
 * allowlist.allow(owner, tradeService);
 */
export function issueCredential(label: string): CallerCredential {
	const trimmed = label.trim();
	if (trimmed.length === 0) {
		throw new Error("Credential label cannot be empty");
	}
	const obj: { __opaque: true; toString: () => string; toJSON: () => string } = Object.create(null);
	obj.__opaque = true as const;
	obj.toString = () => "[REDACTED]";
	obj.toJSON = () => "[REDACTED]";
	Object.defineProperty(obj, Symbol.for("nodejs.util.inspect.custom"), {
		value: () => "[REDACTED]",
	});
	labels.set(obj, trimmed);
	return obj as unknown as CallerCredential;
}

// ── Accessor ─────────────────────────────────────────────────────────

/**
 * Returns the label a credential was issued with.
 * @throws AuthorizationError("NotWhitelisted") if the object was not issued by issueCredential()
 */
export function credentialLabel(credential: CallerCredential): string {
	const label = labels.get(credential);
	if (label === undefined) {
		throw new AuthorizationError("NotWhitelisted", "Unrecognized credential object");
	}
	return label;
}

/** True if the object was produced by issueCredential(). */
export function isIssuedCredential(value: unknown): value is CallerCredential {
	return typeof value === "object" && value !== null && labels.has(value);
}
