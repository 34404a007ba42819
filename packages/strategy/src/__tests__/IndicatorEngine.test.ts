import { describe, it, expect } from '@jest/globals';
import { DEFAULT_CONFIG } from '@tickwise/config';
import { IndicatorSnapshot } from '@tickwise/types';
import { buildCandles, linearCloses } from '@tickwise/testing';
import {
  IndicatorEngine,
  bollingerBands,
  emaSeries,
  relativeStrengthIndex
} from '../IndicatorEngine';

const T0 = new Date(2026, 0, 5, 10, 0).getTime();

function ready(engine: IndicatorEngine, closes: number[]): IndicatorSnapshot {
  const result = engine.compute(buildCandles('BTCUSDT', closes, T0));
  if (result.status !== 'ready') {
    throw new Error(`expected a ready snapshot, got ${result.status}`);
  }
  return result.snapshot;
}

describe('indicator helpers', () => {
  it('should seed the EMA with the first value', () => {
    expect(emaSeries([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });

  it('should average gains and losses over the last period changes', () => {
    // changes +1 -1 +2 -1 +2: mean gain 1, mean loss 0.4
    expect(relativeStrengthIndex([10, 11, 10, 12, 11, 13], 5)).toBeCloseTo(100 - 100 / 3.5, 10);
  });

  it('should score 100 when there are no losses', () => {
    expect(relativeStrengthIndex([5, 5, 5, 5, 5, 5], 5)).toBe(100);
    expect(relativeStrengthIndex([1, 2, 3, 4, 5, 6], 5)).toBe(100);
  });

  it('should use the sample standard deviation for the bands', () => {
    const bands = bollingerBands(linearCloses(110, 10), 10, 2);

    expect(bands.mid).toBe(114.5);
    expect(bands.upper - bands.mid).toBeCloseTo(2 * Math.sqrt(110 / 12), 10);
    expect(bands.mid - bands.lower).toBeCloseTo(bands.upper - bands.mid, 10);
  });
});

describe('IndicatorEngine', () => {
  const engine = new IndicatorEngine(DEFAULT_CONFIG.indicators);

  it('should need enough candles for the slowest indicator', () => {
    expect(engine.requiredLookback()).toBe(17);
  });

  it('should report insufficient data instead of filling gaps', () => {
    const result = engine.compute(buildCandles('BTCUSDT', linearCloses(100, 16), T0));

    expect(result).toEqual({ status: 'insufficient', required: 17, available: 16 });
  });

  it('should describe a steady rise as a bullish snapshot', () => {
    const snapshot = ready(engine, linearCloses(100, 20));

    expect(snapshot.close).toBe(119);
    expect(snapshot.timestamp).toBe(T0 + 19 * 60_000);
    expect(snapshot.emaShort).toBeGreaterThan(snapshot.emaLong);
    expect(snapshot.momentum).toBe(3);
    expect(snapshot.rsi).toBe(100);
    expect(snapshot.macd).toBeGreaterThan(snapshot.macdSignal);
    expect(snapshot.bbMid).toBe(114.5);
  });

  it('should describe a steady fall as a bearish snapshot', () => {
    const snapshot = ready(engine, linearCloses(119, 20, -1));

    expect(snapshot.emaShort).toBeLessThan(snapshot.emaLong);
    expect(snapshot.momentum).toBe(-3);
    expect(snapshot.rsi).toBe(0);
    expect(snapshot.macd).toBeLessThan(snapshot.macdSignal);
  });

  it('should keep RSI within 0 and 100 on choppy data', () => {
    const closes = [100, 103, 99, 104, 98, 105, 97, 101, 102, 96, 100, 103, 99, 98, 104, 100, 101, 97];
    const snapshot = ready(engine, closes);

    expect(snapshot.rsi).toBeGreaterThanOrEqual(0);
    expect(snapshot.rsi).toBeLessThanOrEqual(100);
  });

  it('should depend only on the window contents', () => {
    const candles = buildCandles('BTCUSDT', [100, 103, 99, 104, 98, 105, 97, 101, 102, 96, 100, 103, 99, 98, 104, 100, 101], T0);
    const copy = candles.map(candle => ({ ...candle }));

    const first = engine.compute(candles);
    const second = engine.compute(candles);

    expect(second).toEqual(first);
    expect(candles).toEqual(copy);
  });
});
