export { fixImbalances } from './driver.js';
export type { FixupConfig, FixupStats, FixupResult, LineItemOutcome, LineItemStatus } from './types.js';
