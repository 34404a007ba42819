import { TradingConfig } from './types';

export const DEFAULT_CONFIG: TradingConfig = {
  environment: 'development',
  logLevel: 'info',
  symbols: ['BTCUSDT', 'ETHUSDT'],
  checkInterval: 60,
  windowCapacity: 100,
  shutdownGracePeriod: 10,
  flattenOnShutdown: false,
  indicators: {
    emaShort: 3,
    emaLong: 7,
    rsiPeriod: 5,
    rsiOverbought: 70,
    rsiOversold: 30,
    macdFast: 8,
    macdSlow: 17,
    macdSignal: 7,
    bbPeriod: 10,
    bbStdDev: 2,
    momentumPeriod: 3
  },
  trading: {
    maxPositionTime: 10,
    maxRiskPercent: 5,
    minSignalStrength: 50,
    stopLossPercent: 1.0,
    takeProfitPercent: 2.0,
    enableTrailingStop: true,
    trailingStopPercent: 0.5,
    signalStopOffset: 0.7,
    signalTakeOffset: 1.8,
    requireMarketConfirmation: false,
    volumeSurgeFactor: 1.2,
    minPriceChangePercent: 0.1,
    minRsiChange: 3
  },
  risk: {
    maxPositionSize: 0.1,
    minPositionSize: 0.01,
    defaultPositionSize: 0.05,
    fixedLotSize: 100,
    useFixedLot: false,
    maxDailyLoss: 0.05,
    maxPositionLoss: 0.02,
    maxOpenPositions: 3,
    minTimeBetweenTrades: 300,
    overrideSignalLevels: false,
    maxTradeHistory: 1000
  },
  rateLimit: {
    signalCheckInterval: 300,
    signalMinimumInterval: 3600,
    orderCooldown: 1800,
    maxDailyOrders: 10,
    tradingHoursStart: 9,
    tradingHoursEnd: 21,
    tradingDays: [1, 2, 3, 4, 5]
  }
};
