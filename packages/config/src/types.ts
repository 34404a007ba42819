export interface IndicatorSettings {
  emaShort: number;
  emaLong: number;
  rsiPeriod: number;
  rsiOverbought: number;
  rsiOversold: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  bbPeriod: number;
  bbStdDev: number;
  momentumPeriod: number;
}

export interface TradingSettings {
  /** Minutes a position may stay open before a MaxTime exit */
  maxPositionTime: number;
  /** Percent of balance a single position may put at risk down to its stop */
  maxRiskPercent: number;
  minSignalStrength: number;
  stopLossPercent: number;
  takeProfitPercent: number;
  enableTrailingStop: boolean;
  trailingStopPercent: number;
  /** Stop offset, in percent of entry, proposed with every signal */
  signalStopOffset: number;
  /** Take-profit offset, in percent of entry, proposed with every signal */
  signalTakeOffset: number;
  requireMarketConfirmation: boolean;
  volumeSurgeFactor: number;
  minPriceChangePercent: number;
  minRsiChange: number;
}

export interface RiskSettings {
  maxPositionSize: number;
  minPositionSize: number;
  defaultPositionSize: number;
  fixedLotSize: number;
  useFixedLot: boolean;
  maxDailyLoss: number;
  maxPositionLoss: number;
  maxOpenPositions: number;
  /** Seconds */
  minTimeBetweenTrades: number;
  overrideSignalLevels: boolean;
  maxTradeHistory: number;
}

export interface RateLimitSettings {
  /** Seconds */
  signalCheckInterval: number;
  /** Seconds */
  signalMinimumInterval: number;
  /** Seconds */
  orderCooldown: number;
  maxDailyOrders: number;
  tradingHoursStart: number;
  tradingHoursEnd: number;
  /** ISO weekdays, 1 = Monday ... 7 = Sunday */
  tradingDays: number[];
}

export interface TradingConfig {
  environment: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  symbols: string[];
  /** Seconds between management ticks */
  checkInterval: number;
  windowCapacity: number;
  /** Seconds */
  shutdownGracePeriod: number;
  flattenOnShutdown: boolean;
  indicators: IndicatorSettings;
  trading: TradingSettings;
  risk: RiskSettings;
  rateLimit: RateLimitSettings;
}
