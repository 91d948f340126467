// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type LogLevel,
	type Logger,
	type LoggerConfig,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { type EventMap, type Listener, TypedEmitter } from "./lib/events/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";

// ── Access Control ───────────────────────────────────────────────────
export * from "./auth/index.js";

// ── Configuration ────────────────────────────────────────────────────
export * from "./config/index.js";

// ── Oracle ───────────────────────────────────────────────────────────
export * from "./oracle/index.js";

// ── Stores ───────────────────────────────────────────────────────────
export * from "./storage/index.js";

// ── Calculators ──────────────────────────────────────────────────────
export * from "./calculator/index.js";

// ── Settlement ───────────────────────────────────────────────────────
export * from "./settlement/index.js";

// ── Trading Services ─────────────────────────────────────────────────
export * from "./trading/index.js";
