/**
 * Engine events. Services emit only after their transaction commits, so a
 * listener never sees a change that was rolled back.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { SettlementReceipt } from "../settlement/types.js";
import type { CollateralMovement, LiquidationReceipt, PositionChange } from "./types.js";

export type EngineEventMap = {
	positionChanged: [change: PositionChange];
	feesSettled: [receipt: SettlementReceipt];
	collateralDeposited: [movement: CollateralMovement];
	collateralWithdrawn: [movement: CollateralMovement];
	accountLiquidated: [receipt: LiquidationReceipt];
};

export type EngineEvents = TypedEmitter<EngineEventMap>;

/** An emitter that logs, rather than rethrows, a failing listener. */
export function createEngineEvents(logger?: Logger): EngineEvents {
	return new TypedEmitter<EngineEventMap>((error, event) => {
		logger?.error({ event, err: error }, "event listener failed");
	});
}
