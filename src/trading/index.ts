export type {
	CollateralError,
	CollateralMovement,
	CollateralRequest,
	DecreasePositionRequest,
	IncreasePositionRequest,
	LiquidatedPosition,
	LiquidationError,
	LiquidationReceipt,
	PositionChange,
	TradeError,
} from "./types.js";
export { type EngineEventMap, type EngineEvents, createEngineEvents } from "./events.js";
export { MarketBook, type Resize, emptyPosition } from "./market-book.js";
export { TradeService, type TradeServiceDeps } from "./trade-service.js";
export { CrossMarginService, type CrossMarginServiceDeps } from "./cross-margin-service.js";
export { LiquidationService, type LiquidationServiceDeps } from "./liquidation-service.js";
export { type PerpEngine, type PerpEngineOptions, createPerpEngine } from "./engine.js";
