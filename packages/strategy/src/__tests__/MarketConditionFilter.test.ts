import { describe, it, expect } from '@jest/globals';
import { DEFAULT_CONFIG } from '@tickwise/config';
import { Candle, IndicatorSnapshot } from '@tickwise/types';
import { buildCandle } from '@tickwise/testing';
import { MarketConditionFilter } from '../MarketConditionFilter';

const T0 = new Date(2026, 0, 5, 10, 0).getTime();

function candlesWithVolumes(volumes: number[]): Candle[] {
  return volumes.map((volume, index) => buildCandle('BTCUSDT', T0 + index * 60_000, 100, volume));
}

const snapshot: IndicatorSnapshot = {
  timestamp: T0,
  close: 100,
  emaShort: 101,
  emaLong: 100,
  rsi: 50,
  macd: 0,
  macdSignal: 0,
  bbUpper: 102,
  bbMid: 100,
  bbLower: 98,
  momentum: 0
};

describe('MarketConditionFilter', () => {
  const enabled = { ...DEFAULT_CONFIG.trading, requireMarketConfirmation: true };
  const surge = candlesWithVolumes([...Array<number>(19).fill(1000), 2000]);

  it('should let everything through when confirmation is off', () => {
    const filter = new MarketConditionFilter(DEFAULT_CONFIG.trading);

    expect(filter.assess('BTCUSDT', [], snapshot)).toEqual({
      volumeConfirmed: true,
      significantChange: true,
      proceed: true
    });
  });

  it('should only record a baseline on the first assessment', () => {
    const filter = new MarketConditionFilter(enabled);

    const result = filter.assess('BTCUSDT', surge, snapshot);

    expect(result).toEqual({ volumeConfirmed: true, significantChange: false, proceed: false });
  });

  it('should proceed on a volume surge after a material price move', () => {
    const filter = new MarketConditionFilter(enabled);
    filter.assess('BTCUSDT', surge, snapshot);

    const result = filter.assess('BTCUSDT', surge, { ...snapshot, close: 100.5 });

    expect(result.proceed).toBe(true);
  });

  it('should treat a trend flip as a significant change', () => {
    const filter = new MarketConditionFilter(enabled);
    filter.assess('BTCUSDT', surge, snapshot);

    const result = filter.assess('BTCUSDT', surge, { ...snapshot, emaShort: 99 });

    expect(result.significantChange).toBe(true);
  });

  it('should not confirm volume without a full averaging window', () => {
    const filter = new MarketConditionFilter(enabled);

    expect(filter.assess('BTCUSDT', surge.slice(1), snapshot).volumeConfirmed).toBe(false);
  });

  it('should not confirm ordinary volume', () => {
    const filter = new MarketConditionFilter(enabled);
    const flat = candlesWithVolumes(Array<number>(20).fill(1000));

    expect(filter.assess('BTCUSDT', flat, snapshot).volumeConfirmed).toBe(false);
  });
});
