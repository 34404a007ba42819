/**
 * @tickwise/risk-engine - Risk gating, sizing and rate limits
 */

export * from './types';
export { RiskManager } from './RiskManager';
export type { RiskManagerOptions, RiskTradingSettings } from './RiskManager';
export { RateLimiter } from './RateLimiter';
export type { RateLimiterOptions } from './RateLimiter';
