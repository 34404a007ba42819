/**
 * Price Window
 *
 * Bounded, time-ordered rolling buffer of closed candles for one symbol.
 * Timestamps are strictly increasing; the oldest candle is evicted once the
 * window holds `capacity` candles.
 */

import { Candle } from '@tickwise/types';
import { CircularBuffer } from '@tickwise/utils';

export const DEFAULT_WINDOW_CAPACITY = 100;

export type AppendResult =
  | { accepted: true; evicted?: Candle }
  | { accepted: false; reason: 'stale'; lastTimestamp: number }
  | { accepted: false; reason: 'symbol-mismatch'; expected: string };

export class PriceWindow {
  private readonly buffer: CircularBuffer<Candle>;

  constructor(
    public readonly symbol: string,
    capacity: number = DEFAULT_WINDOW_CAPACITY
  ) {
    this.buffer = new CircularBuffer<Candle>(capacity);
  }

  /**
   * Append a closed candle. Candles at or before the last stored timestamp
   * are rejected and leave the window untouched.
   */
  append(candle: Candle): AppendResult {
    if (candle.symbol !== this.symbol) {
      return { accepted: false, reason: 'symbol-mismatch', expected: this.symbol };
    }

    const last = this.buffer.last();
    if (last && candle.timestamp <= last.timestamp) {
      return { accepted: false, reason: 'stale', lastTimestamp: last.timestamp };
    }

    const evicted = this.buffer.push(Object.freeze({ ...candle }));
    return evicted ? { accepted: true, evicted } : { accepted: true };
  }

  /**
   * Immutable ordered view, oldest first
   */
  snapshot(): readonly Candle[] {
    return Object.freeze(this.buffer.toArray());
  }

  latest(): Candle | undefined {
    return this.buffer.last();
  }

  get size(): number {
    return this.buffer.size;
  }

  get capacity(): number {
    return this.buffer.maxSize;
  }

  get isFull(): boolean {
    return this.buffer.isFull;
  }
}
