/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Config loading uses this instead of importing Zod directly; `z` is
 * re-exported so schemas can be declared next to the types they check.
 */

import { z } from "zod";
import { ErrorCategory, PerpError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Configuration-category error containing one or more validation issues. */
export class ValidationError extends PerpError<"VALIDATION_FAILED"> {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Config, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** One line per issue, `path: message`. */
	describe(): string {
		return this.issues
			.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
			.join("; ");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}
