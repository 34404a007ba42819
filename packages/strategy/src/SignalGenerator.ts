/**
 * Signal Generator
 *
 * Scores an indicator snapshot in both directions and proposes an entry with
 * protective levels when every condition of one direction holds. Long wins
 * when both directions qualify.
 */

import { IndicatorSettings, TradingSettings } from '@tickwise/config';
import { IndicatorSnapshot, OrderSide, Signal } from '@tickwise/types';
import { generateId, Logger } from '@tickwise/utils';

// Weights of the strength factors, in DirectionCheck factor order
export const STRENGTH_WEIGHTS = {
  priceVsShortEma: 1.2,
  trendCross: 1.2,
  rsiMidBand: 1.0,
  macd: 1.1,
  priceVsBandMid: 1.0,
  momentum: 1.0
} as const;

type StrengthFactor = keyof typeof STRENGTH_WEIGHTS;

const FACTORS: readonly StrengthFactor[] = [
  'priceVsShortEma',
  'trendCross',
  'rsiMidBand',
  'macd',
  'priceVsBandMid',
  'momentum'
];

const TOTAL_WEIGHT = FACTORS.reduce((sum, factor) => sum + STRENGTH_WEIGHTS[factor], 0);

// RSI band shared by the strength score and the short entry condition
const RSI_MID_LOW = 35;
const RSI_MID_HIGH = 65;

export interface DirectionCheck {
  factors: Record<StrengthFactor, boolean>;
  rsiInRange: boolean;
  strength: number;
  strengthOk: boolean;
  eligible: boolean;
}

export interface SignalDiagnostics {
  long: DirectionCheck;
  short: DirectionCheck;
}

export interface SignalInput {
  symbol: string;
  snapshot: IndicatorSnapshot;
  price: number;
  hasOpenPosition: boolean;
  now: number;
}

export interface SignalEvaluation {
  signal: Signal | null;
  diagnostics: SignalDiagnostics | null;
}

export type SignalGeneratorSettings = Pick<IndicatorSettings, 'rsiOversold'> &
  Pick<TradingSettings, 'minSignalStrength' | 'signalStopOffset' | 'signalTakeOffset'>;

export function strengthOf(factors: Record<StrengthFactor, boolean>): number {
  const weighted = FACTORS.reduce(
    (sum, factor) => (factors[factor] ? sum + STRENGTH_WEIGHTS[factor] : sum),
    0
  );
  return (weighted / TOTAL_WEIGHT) * 100;
}

export class SignalGenerator {
  private logger: Logger;

  constructor(private readonly settings: SignalGeneratorSettings, logger?: Logger) {
    this.logger = logger ?? new Logger('SignalGenerator');
  }

  checkDirection(snapshot: IndicatorSnapshot, side: OrderSide): DirectionCheck {
    const long = side === OrderSide.BUY;
    const { close, emaShort, emaLong, rsi, macd, macdSignal, bbMid, momentum } = snapshot;

    const factors: Record<StrengthFactor, boolean> = {
      priceVsShortEma: long ? close > emaShort : close < emaShort,
      trendCross: long ? emaShort > emaLong : emaShort < emaLong,
      rsiMidBand: rsi > RSI_MID_LOW && rsi < RSI_MID_HIGH,
      macd: long ? macd > macdSignal : macd < macdSignal,
      priceVsBandMid: long ? close > bbMid : close < bbMid,
      momentum: long ? momentum > 0 : momentum < 0
    };

    // Longs accept anything above the oversold line, shorts only the mid band
    const rsiFloor = long ? this.settings.rsiOversold : RSI_MID_LOW;
    const rsiInRange = rsi > rsiFloor && rsi < RSI_MID_HIGH;

    const strength = strengthOf(factors);
    const strengthOk = strength >= this.settings.minSignalStrength;

    const eligible =
      factors.trendCross &&
      rsiInRange &&
      factors.macd &&
      factors.priceVsBandMid &&
      factors.momentum &&
      strengthOk;

    return { factors, rsiInRange, strength, strengthOk, eligible };
  }

  evaluate(input: SignalInput): SignalEvaluation {
    if (input.hasOpenPosition) {
      this.logger.debug(`Skip signal analysis - open position exists for ${input.symbol}`);
      return { signal: null, diagnostics: null };
    }

    const diagnostics: SignalDiagnostics = {
      long: this.checkDirection(input.snapshot, OrderSide.BUY),
      short: this.checkDirection(input.snapshot, OrderSide.SELL)
    };

    this.logger.debug(`Signal conditions for ${input.symbol}`, {
      long: diagnostics.long,
      short: diagnostics.short
    });

    let side: OrderSide | null = null;
    if (diagnostics.long.eligible) {
      side = OrderSide.BUY;
    } else if (diagnostics.short.eligible) {
      side = OrderSide.SELL;
    }

    if (!side) {
      return { signal: null, diagnostics };
    }

    const strength = side === OrderSide.BUY ? diagnostics.long.strength : diagnostics.short.strength;
    const signal: Signal = {
      id: generateId('sig'),
      symbol: input.symbol,
      side,
      price: input.price,
      strength,
      ...this.proposeLevels(input.price, side),
      generatedAt: input.now
    };

    this.logger.info(`Generated ${side === OrderSide.BUY ? 'LONG' : 'SHORT'} signal for ${input.symbol}`, {
      strength: strength.toFixed(2),
      price: input.price
    });

    return { signal, diagnostics };
  }

  proposeLevels(price: number, side: OrderSide): { stopLoss: number; takeProfit: number } {
    const stopOffset = this.settings.signalStopOffset / 100;
    const takeOffset = this.settings.signalTakeOffset / 100;

    return side === OrderSide.BUY
      ? { stopLoss: price * (1 - stopOffset), takeProfit: price * (1 + takeOffset) }
      : { stopLoss: price * (1 + stopOffset), takeProfit: price * (1 - takeOffset) };
  }
}
