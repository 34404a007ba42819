import Joi from 'joi';
import {
  IndicatorSettings,
  RateLimitSettings,
  RiskSettings,
  TradingConfig,
  TradingSettings
} from './types';

const period = () => Joi.number().integer().min(1);
const percent = () => Joi.number().min(0).max(100);
const fraction = () => Joi.number().min(0).max(1);
const seconds = () => Joi.number().min(0);

const indicatorsSchema = Joi.object<IndicatorSettings>({
  emaShort: period().required(),
  emaLong: period().greater(Joi.ref('emaShort')).required(),
  rsiPeriod: period().required(),
  rsiOverbought: percent().required(),
  rsiOversold: percent().less(Joi.ref('rsiOverbought')).required(),
  macdFast: period().required(),
  macdSlow: period().greater(Joi.ref('macdFast')).required(),
  macdSignal: period().required(),
  bbPeriod: Joi.number().integer().min(2).required(),
  bbStdDev: Joi.number().positive().required(),
  momentumPeriod: period().required()
});

const tradingSchema = Joi.object<TradingSettings>({
  maxPositionTime: Joi.number().positive().required(),
  maxRiskPercent: percent().required(),
  minSignalStrength: percent().required(),
  stopLossPercent: Joi.number().positive().max(100).required(),
  takeProfitPercent: Joi.number().positive().max(100).required(),
  enableTrailingStop: Joi.boolean().required(),
  trailingStopPercent: Joi.number().positive().max(100).required(),
  signalStopOffset: Joi.number().positive().max(100).required(),
  signalTakeOffset: Joi.number().positive().max(100).required(),
  requireMarketConfirmation: Joi.boolean().required(),
  volumeSurgeFactor: Joi.number().positive().required(),
  minPriceChangePercent: Joi.number().min(0).required(),
  minRsiChange: Joi.number().min(0).required()
});

const riskSchema = Joi.object<RiskSettings>({
  maxPositionSize: fraction().positive().required(),
  minPositionSize: fraction().max(Joi.ref('maxPositionSize')).required(),
  defaultPositionSize: fraction()
    .min(Joi.ref('minPositionSize'))
    .max(Joi.ref('maxPositionSize'))
    .required(),
  fixedLotSize: Joi.number().positive().required(),
  useFixedLot: Joi.boolean().required(),
  maxDailyLoss: fraction().positive().required(),
  maxPositionLoss: fraction().required(),
  maxOpenPositions: Joi.number().integer().min(1).required(),
  minTimeBetweenTrades: seconds().required(),
  overrideSignalLevels: Joi.boolean().required(),
  maxTradeHistory: Joi.number().integer().min(1).required()
});

const rateLimitSchema = Joi.object<RateLimitSettings>({
  signalCheckInterval: seconds().required(),
  signalMinimumInterval: seconds().required(),
  orderCooldown: seconds().required(),
  maxDailyOrders: Joi.number().integer().min(0).required(),
  tradingHoursStart: Joi.number().integer().min(0).max(23).required(),
  tradingHoursEnd: Joi.number().integer().max(24).greater(Joi.ref('tradingHoursStart')).required(),
  tradingDays: Joi.array().items(Joi.number().integer().min(1).max(7)).min(1).unique().required()
});

export const tradingConfigSchema = Joi.object<TradingConfig>({
  environment: Joi.string().required(),
  logLevel: Joi.string().valid('error', 'warn', 'info', 'debug').required(),
  symbols: Joi.array().items(Joi.string().trim().min(1)).min(1).unique().required(),
  checkInterval: Joi.number().positive().required(),
  windowCapacity: Joi.number().integer().min(2).required(),
  shutdownGracePeriod: seconds().required(),
  flattenOnShutdown: Joi.boolean().required(),
  indicators: indicatorsSchema.required(),
  trading: tradingSchema.required(),
  risk: riskSchema.required(),
  rateLimit: rateLimitSchema.required()
});
