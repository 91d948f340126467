export type { GlobalAssetClassState, GlobalMarketState, Position } from "./types.js";
export { EMPTY_ASSET_CLASS_STATE, EMPTY_MARKET_STATE } from "./types.js";
export { UndoLog } from "./undo-log.js";
export { LedgerStore, type PoolBucket } from "./ledger-store.js";
export { PositionStore, positionIdFor, positionSubAccount } from "./position-store.js";
