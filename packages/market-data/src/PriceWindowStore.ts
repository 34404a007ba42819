import { Candle } from '@tickwise/types';
import { Logger } from '@tickwise/utils';
import { DEFAULT_WINDOW_CAPACITY, PriceWindow } from './PriceWindow';

export interface SeedResult {
  symbol: string;
  accepted: number;
  skipped: number;
}

/**
 * One PriceWindow per symbol, created on first use
 */
export class PriceWindowStore {
  private windows: Map<string, PriceWindow> = new Map();
  private logger: Logger;

  constructor(
    private readonly capacity: number = DEFAULT_WINDOW_CAPACITY,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('PriceWindowStore');
  }

  get(symbol: string): PriceWindow {
    let window = this.windows.get(symbol);
    if (!window) {
      window = new PriceWindow(symbol, this.capacity);
      this.windows.set(symbol, window);
    }
    return window;
  }

  has(symbol: string): boolean {
    return this.windows.has(symbol);
  }

  symbols(): string[] {
    return Array.from(this.windows.keys());
  }

  /**
   * Warm a window from historical candles, oldest first. Out-of-order
   * entries are skipped like any other stale candle.
   */
  seed(symbol: string, candles: readonly Candle[]): SeedResult {
    const window = this.get(symbol);
    const ordered = [...candles].sort((a, b) => a.timestamp - b.timestamp);
    let accepted = 0;
    let skipped = 0;

    for (const candle of ordered) {
      if (window.append(candle).accepted) {
        accepted++;
      } else {
        skipped++;
      }
    }

    this.logger.info(`Seeded price window for ${symbol}`, { accepted, skipped, size: window.size });
    return { symbol, accepted, skipped };
  }
}
