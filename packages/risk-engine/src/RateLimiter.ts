import { RateLimitSettings } from '@tickwise/config';
import { Clock, Logger, localDateKey, systemClock } from '@tickwise/utils';
import { SymbolRateStatus, TradingStatus } from './types';

export interface RateLimiterOptions {
  now?: Clock;
  logger?: Logger;
}

/**
 * Trading-hours window plus per-symbol signal and order spacing.
 * Callers register a signal or order only after it actually happened.
 */
export class RateLimiter {
  private logger: Logger;
  private now: Clock;
  private lastSignalTime: Map<string, number> = new Map();
  private lastOrderTime: Map<string, number> = new Map();
  private dailyOrders = 0;
  // Symbols with an entry order in flight; they count toward the daily cap
  private pendingOrders: Set<string> = new Set();
  private orderDate: string;

  constructor(private readonly settings: RateLimitSettings, options: RateLimiterOptions = {}) {
    this.logger = options.logger ?? new Logger('RateLimiter');
    this.now = options.now ?? systemClock;
    this.orderDate = localDateKey(this.now());
  }

  canCheckSignal(symbol: string): boolean {
    if (!this.isTradingTime()) {
      return false;
    }

    const last = this.lastSignalTime.get(symbol);
    if (last === undefined) {
      return true;
    }
    return this.now() - last >= this.settings.signalCheckInterval * 1000;
  }

  canPlaceOrder(symbol: string): boolean {
    this.rollDay();

    if (this.dailyOrders + this.pendingOrders.size >= this.settings.maxDailyOrders) {
      this.logger.info(`Daily order limit reached (${this.settings.maxDailyOrders})`);
      return false;
    }

    const last = this.lastOrderTime.get(symbol);
    if (last !== undefined && this.now() - last < this.settings.orderCooldown * 1000) {
      this.logger.info(`Order cooldown active for ${symbol}`, {
        nextOrderTime: new Date(this.getNextOrderTime(symbol)).toISOString()
      });
      return false;
    }

    return this.isTradingTime();
  }

  registerSignal(symbol: string): void {
    this.lastSignalTime.set(symbol, this.now());
  }

  reserveOrder(symbol: string): void {
    this.pendingOrders.add(symbol);
  }

  releaseOrder(symbol: string): void {
    this.pendingOrders.delete(symbol);
  }

  registerOrder(symbol: string): void {
    this.rollDay();
    this.pendingOrders.delete(symbol);
    this.lastOrderTime.set(symbol, this.now());
    this.dailyOrders++;
  }

  /**
   * Local hour within [start, end) on a configured ISO weekday
   */
  isTradingTime(): boolean {
    const date = new Date(this.now());
    const isoWeekday = date.getDay() === 0 ? 7 : date.getDay();
    const hour = date.getHours();

    return (
      this.settings.tradingDays.includes(isoWeekday) &&
      hour >= this.settings.tradingHoursStart &&
      hour < this.settings.tradingHoursEnd
    );
  }

  /**
   * Earliest time another signal is expected for the symbol
   */
  getNextSignalTime(symbol: string): number {
    const last = this.lastSignalTime.get(symbol);
    return last === undefined ? this.now() : last + this.settings.signalMinimumInterval * 1000;
  }

  getNextOrderTime(symbol: string): number {
    const last = this.lastOrderTime.get(symbol);
    return last === undefined ? this.now() : last + this.settings.orderCooldown * 1000;
  }

  getTradingStatus(): TradingStatus {
    this.rollDay();

    const symbols: Record<string, SymbolRateStatus> = {};
    const known = new Set([...this.lastSignalTime.keys(), ...this.lastOrderTime.keys()]);
    for (const symbol of known) {
      symbols[symbol] = {
        lastSignalTime: this.lastSignalTime.get(symbol) ?? null,
        lastOrderTime: this.lastOrderTime.get(symbol) ?? null,
        canCheckSignal: this.canCheckSignal(symbol),
        canPlaceOrder: this.canPlaceOrder(symbol),
        nextSignalTime: this.getNextSignalTime(symbol),
        nextOrderTime: this.getNextOrderTime(symbol)
      };
    }

    return {
      isTradingTime: this.isTradingTime(),
      date: this.orderDate,
      dailyOrders: this.dailyOrders,
      pendingOrders: this.pendingOrders.size,
      maxDailyOrders: this.settings.maxDailyOrders,
      remainingOrders: Math.max(
        0,
        this.settings.maxDailyOrders - this.dailyOrders - this.pendingOrders.size
      ),
      symbols
    };
  }

  private rollDay(): void {
    const today = localDateKey(this.now());
    if (today !== this.orderDate) {
      this.orderDate = today;
      this.dailyOrders = 0;
    }
  }
}
