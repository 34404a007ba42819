import { describe, it, expect } from '@jest/globals';
import { buildCandle, buildCandles, linearCloses, ONE_MINUTE } from '@tickwise/testing';
import { PriceWindow } from '../PriceWindow';
import { PriceWindowStore } from '../PriceWindowStore';

const T0 = new Date(2026, 0, 5, 10, 0).getTime();

describe('PriceWindow', () => {
  it('should keep the most recent candles up to capacity, oldest first', () => {
    const window = new PriceWindow('BTCUSDT', 5);
    const candles = buildCandles('BTCUSDT', linearCloses(100, 8), T0);

    candles.forEach(candle => window.append(candle));

    const snapshot = window.snapshot();
    expect(window.size).toBe(5);
    expect(window.isFull).toBe(true);
    expect(snapshot.map(c => c.close)).toEqual([103, 104, 105, 106, 107]);
    for (let i = 1; i < snapshot.length; i++) {
      expect(snapshot[i].timestamp).toBeGreaterThan(snapshot[i - 1].timestamp);
    }
  });

  it('should report the evicted candle once full', () => {
    const window = new PriceWindow('BTCUSDT', 2);
    window.append(buildCandle('BTCUSDT', T0, 100));
    window.append(buildCandle('BTCUSDT', T0 + ONE_MINUTE, 101));

    const result = window.append(buildCandle('BTCUSDT', T0 + 2 * ONE_MINUTE, 102));

    expect(result.accepted).toBe(true);
    expect(result.accepted && result.evicted?.close).toBe(100);
  });

  it('should reject stale candles without changing the window', () => {
    const window = new PriceWindow('BTCUSDT', 10);
    window.append(buildCandle('BTCUSDT', T0, 100));
    window.append(buildCandle('BTCUSDT', T0 + ONE_MINUTE, 101));
    const before = window.snapshot();

    const duplicate = window.append(buildCandle('BTCUSDT', T0 + ONE_MINUTE, 999));
    const older = window.append(buildCandle('BTCUSDT', T0 - ONE_MINUTE, 98));

    expect(duplicate).toEqual({ accepted: false, reason: 'stale', lastTimestamp: T0 + ONE_MINUTE });
    expect(older.accepted).toBe(false);
    expect(window.snapshot()).toEqual(before);
    expect(window.latest()?.close).toBe(101);
  });

  it('should reject candles for another symbol', () => {
    const window = new PriceWindow('BTCUSDT', 10);

    const result = window.append(buildCandle('ETHUSDT', T0, 100));

    expect(result).toEqual({ accepted: false, reason: 'symbol-mismatch', expected: 'BTCUSDT' });
    expect(window.size).toBe(0);
  });

  it('should store candles that cannot be mutated afterwards', () => {
    const window = new PriceWindow('BTCUSDT', 10);
    window.append(buildCandle('BTCUSDT', T0, 100));

    const snapshot = window.snapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });
});

describe('PriceWindowStore', () => {
  it('should create one window per symbol with the configured capacity', () => {
    const store = new PriceWindowStore(20);

    const btc = store.get('BTCUSDT');

    expect(store.get('BTCUSDT')).toBe(btc);
    expect(btc.capacity).toBe(20);
    expect(store.has('ETHUSDT')).toBe(false);
    expect(store.symbols()).toEqual(['BTCUSDT']);
  });

  it('should seed from unordered history and skip duplicates', () => {
    const store = new PriceWindowStore(10);
    const candles = buildCandles('ETHUSDT', [10, 11, 12], T0);

    const result = store.seed('ETHUSDT', [candles[2], candles[0], candles[1], candles[1]]);

    expect(result).toEqual({ symbol: 'ETHUSDT', accepted: 3, skipped: 1 });
    expect(store.get('ETHUSDT').snapshot().map(c => c.close)).toEqual([10, 11, 12]);
  });
});
