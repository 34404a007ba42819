import * as ss from 'simple-statistics';
import { IndicatorSettings } from '@tickwise/config';
import { Candle, IndicatorResult, IndicatorSnapshot } from '@tickwise/types';

/**
 * Exponential moving average series, seeded by the first value
 * (alpha = 2 / (period + 1), no bias adjustment)
 */
export function emaSeries(values: readonly number[], period: number): number[] {
  const alpha = 2 / (period + 1);
  const series: number[] = [];

  values.forEach((value, index) => {
    series.push(index === 0 ? value : alpha * value + (1 - alpha) * series[index - 1]);
  });

  return series;
}

/**
 * RSI over the last `period` price changes using simple means of gains and
 * losses. A window without losses scores 100.
 */
export function relativeStrengthIndex(closes: readonly number[], period: number): number {
  const recent = closes.slice(-(period + 1));
  const gains: number[] = [];
  const losses: number[] = [];

  for (let i = 1; i < recent.length; i++) {
    const delta = recent[i] - recent[i - 1];
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));
  }

  const avgGain = ss.mean(gains);
  const avgLoss = ss.mean(losses);

  if (avgLoss === 0) {
    return 100;
  }

  return 100 - 100 / (1 + avgGain / avgLoss);
}

export interface BollingerBands {
  upper: number;
  mid: number;
  lower: number;
}

export function bollingerBands(closes: readonly number[], period: number, stdDev: number): BollingerBands {
  const recent = closes.slice(-period);
  const mid = ss.mean(recent);
  const spread = stdDev * ss.sampleStandardDeviation(recent);
  return { upper: mid + spread, mid, lower: mid - spread };
}

export class IndicatorEngine {
  constructor(private readonly settings: IndicatorSettings) {}

  /**
   * Candles needed before every indicator has a defined value
   */
  requiredLookback(): number {
    const { emaLong, macdSlow, rsiPeriod, bbPeriod, momentumPeriod } = this.settings;
    return Math.max(emaLong, macdSlow, rsiPeriod + 1, bbPeriod, momentumPeriod + 1);
  }

  compute(candles: readonly Candle[]): IndicatorResult {
    const required = this.requiredLookback();
    if (candles.length < required) {
      return { status: 'insufficient', required, available: candles.length };
    }

    const s = this.settings;
    const closes = candles.map(candle => candle.close);
    const last = closes.length - 1;

    const slow = emaSeries(closes, s.macdSlow);
    const macdLine = emaSeries(closes, s.macdFast).map((fast, index) => fast - slow[index]);
    const bands = bollingerBands(closes, s.bbPeriod, s.bbStdDev);

    const snapshot: IndicatorSnapshot = {
      timestamp: candles[last].timestamp,
      close: closes[last],
      emaShort: emaSeries(closes, s.emaShort)[last],
      emaLong: emaSeries(closes, s.emaLong)[last],
      rsi: relativeStrengthIndex(closes, s.rsiPeriod),
      macd: macdLine[last],
      macdSignal: emaSeries(macdLine, s.macdSignal)[last],
      bbUpper: bands.upper,
      bbMid: bands.mid,
      bbLower: bands.lower,
      momentum: closes[last] - closes[last - s.momentumPeriod]
    };

    return { status: 'ready', snapshot: Object.freeze(snapshot) };
  }
}
