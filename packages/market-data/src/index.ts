/**
 * @tickwise/market-data - Rolling candle history per symbol
 */

export { PriceWindow, DEFAULT_WINDOW_CAPACITY } from './PriceWindow';
export type { AppendResult } from './PriceWindow';
export { PriceWindowStore } from './PriceWindowStore';
export type { SeedResult } from './PriceWindowStore';
export { ClosedCandleEventSchema, parseClosedCandle, toCandle } from './CandleSchema';
export type { ClosedCandleEvent, ParsedCandle } from './CandleSchema';
