/**
 * Logger wrapper — domain-agnostic structured logging backed by pino.
 *
 * Renders bigint fields (fixed-point amounts) as decimal strings, writes
 * opaque credential objects (anything with `__opaque: true`) as
 * "[REDACTED]" and supports path-based redaction for other fields.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Field serialization ─────────────────────────────────────────────

const MAX_DEPTH = 4;

function isOpaque(value: object): boolean {
	return "__opaque" in value && Reflect.get(value, "__opaque") === true;
}

function serializeValue(value: unknown, depth: number): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value === null || typeof value !== "object") return value;
	if (isOpaque(value)) return "[REDACTED]";
	if (value instanceof Error || depth >= MAX_DEPTH) return value;
	if (Array.isArray(value)) return value.map((item) => serializeValue(item, depth + 1));
	if (value instanceof Set) return [...value].map((item) => serializeValue(item, depth + 1));

	const result: Record<string, unknown> = {};
	for (const [key, inner] of Object.entries(value)) {
		result[key] = serializeValue(inner, depth + 1);
	}
	return result;
}

/** Converts bigint fields to strings and masks opaque credentials. */
export function serializeFields(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = serializeValue(value, 1);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const emit =
		(level: LevelMethod) =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
				pinoLogger[level](String(msgOrObj ?? ""));
			} else if (typeof msgOrObj === "object") {
				pinoLogger[level](serializeFields({ ...msgOrObj }), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj));
			}
		};

	return {
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
		debug: emit("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(serializeFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ feeUsdE30: 500n * 10n ** 30n }, "trading fee settled");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** Logger that discards everything; the default when a service gets none. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
