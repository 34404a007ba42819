/**
 * @tickwise/testing - Paper collaborators and candle builders
 *
 * Stand-ins for the engine's ports that run entirely in process. They record
 * every call so tests can assert on what the engine asked for.
 */

import {
  AccountProvider,
  Candle,
  Notifier,
  OrderExecutor,
  OrderRequest,
  OrderResult,
  Persister,
  PriceFeed,
  Signal,
  TradeRecord,
  TradingEvent
} from '@tickwise/types';

export const ONE_MINUTE = 60_000;

// ============================================================================
// Candle builders
// ============================================================================

export function buildCandle(symbol: string, timestamp: number, close: number, volume = 1000): Candle {
  return {
    symbol,
    timestamp,
    open: close,
    high: close,
    low: close,
    close,
    volume
  };
}

/**
 * One candle per close, spaced `intervalMs` apart starting at `startTs`
 */
export function buildCandles(
  symbol: string,
  closes: readonly number[],
  startTs: number,
  intervalMs: number = ONE_MINUTE
): Candle[] {
  return closes.map((close, index) => buildCandle(symbol, startTs + index * intervalMs, close));
}

/**
 * The closed-candle event a market-data feed would deliver for `candle`
 */
export function closedCandleEvent(candle: Candle) {
  return {
    symbol: candle.symbol,
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
    closeTimestamp: candle.timestamp
  };
}

/**
 * `count` closes starting at `start` and moving by `step` each candle
 */
export function linearCloses(start: number, count: number, step = 1): number[] {
  return Array.from({ length: count }, (_, index) => start + index * step);
}

// ============================================================================
// Ports
// ============================================================================

export class PaperOrderExecutor implements OrderExecutor {
  readonly orders: OrderRequest[] = [];
  private failures: string[] = [];
  private sequence = 0;
  private pending: Array<() => void> = [];
  private held = false;

  /**
   * Queue failures for the next orders, consumed in order
   */
  failNext(...errors: string[]): this {
    this.failures.push(...errors);
    return this;
  }

  /**
   * Keep every order in flight until `release()` is called
   */
  hold(): this {
    this.held = true;
    return this;
  }

  release(): void {
    this.held = false;
    const waiting = this.pending;
    this.pending = [];
    waiting.forEach(resume => resume());
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    this.orders.push({ ...request });

    if (this.held) {
      await new Promise<void>(resolve => this.pending.push(resolve));
    }

    const failure = this.failures.shift();
    if (failure !== undefined) {
      return { ok: false, error: failure };
    }

    this.sequence++;
    return { ok: true, orderId: `paper-${this.sequence}` };
  }
}

export class InMemoryPersister implements Persister {
  readonly signals: Signal[] = [];
  readonly trades: TradeRecord[] = [];
  failSignals = false;
  failTrades = false;

  async saveSignal(signal: Signal): Promise<void> {
    if (this.failSignals) {
      throw new Error('signal store unavailable');
    }
    this.signals.push(signal);
  }

  async saveTrade(trade: TradeRecord): Promise<void> {
    if (this.failTrades) {
      throw new Error('trade store unavailable');
    }
    this.trades.push(trade);
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: TradingEvent[] = [];

  async notify(event: TradingEvent): Promise<void> {
    this.events.push(event);
  }

  ofType<K extends TradingEvent['type']>(type: K): Extract<TradingEvent, { type: K }>[] {
    return this.events.filter(
      (event): event is Extract<TradingEvent, { type: K }> => event.type === type
    );
  }
}

/**
 * Account whose balance follows a script; the last entry repeats
 */
export class ScriptedAccount implements AccountProvider {
  private readonly script: Array<number | null | Error>;
  calls = 0;

  constructor(...script: Array<number | null | Error>) {
    this.script = script.length > 0 ? script : [null];
  }

  async getBalance(): Promise<number | null> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls++;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export class ManualPriceFeed implements PriceFeed {
  private prices: Map<string, number> = new Map();
  private history: Map<string, Candle[]> = new Map();

  setPrice(symbol: string, price: number): this {
    this.prices.set(symbol, price);
    return this;
  }

  setHistory(symbol: string, candles: Candle[]): this {
    this.history.set(symbol, candles);
    return this;
  }

  async getCurrentPrice(symbol: string): Promise<number | null> {
    return this.prices.get(symbol) ?? null;
  }

  async getHistoricalCandles(symbol: string, limit: number): Promise<Candle[]> {
    const candles = this.history.get(symbol) ?? [];
    return candles.slice(-limit);
  }
}

/**
 * Mutable clock for components that take `now: () => number`
 */
export class ManualClock {
  constructor(private current: number) {}

  readonly now = (): number => this.current;

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
