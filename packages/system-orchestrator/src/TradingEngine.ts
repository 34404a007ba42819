/**
 * Trading Engine
 *
 * Drives the per-symbol pipeline from two sources: closed-candle events
 * (entries) and a periodic tick (balance refresh and exits). Both go through
 * the symbol's lane; external calls happen between lane tasks so a reserved
 * symbol stays unavailable while its order is in flight.
 */

import { EventEmitter } from 'events';
import { TradingConfig } from '@tickwise/config';
import { PositionLifecycle, PositionState } from '@tickwise/execution';
import type { CloseReservation, OpenReservation } from '@tickwise/execution';
import { PriceWindowStore, parseClosedCandle } from '@tickwise/market-data';
import { RateLimiter, RiskManager } from '@tickwise/risk-engine';
import type { HistoryStats, TradingStats, TradingStatus } from '@tickwise/risk-engine';
import { IndicatorEngine, MarketConditionFilter, SignalGenerator } from '@tickwise/strategy';
import {
  AccountProvider,
  Candle,
  ExitReason,
  IndicatorSnapshot,
  Notifier,
  OrderExecutor,
  OrderRequest,
  OrderResult,
  Persister,
  Position,
  PriceFeed,
  RiskRejectionReason,
  Signal,
  TradeRecord,
  TradingError,
  TradingErrorCode,
  TradingEvent,
  errorMessage,
  isTradingError,
  oppositeSide
} from '@tickwise/types';
import { Clock, Logger, systemClock } from '@tickwise/utils';
import { SymbolLane } from './SymbolLane';

export interface TradingPorts {
  priceFeed: PriceFeed;
  account: AccountProvider;
  executor: OrderExecutor;
  persister?: Persister;
  notifier?: Notifier;
}

export interface TradingEngineOptions {
  now?: Clock;
  logger?: Logger;
}

export type CandleOutcome =
  | { kind: 'stopped' }
  | { kind: 'invalid'; error: string }
  | { kind: 'stale'; lastTimestamp: number }
  | { kind: 'insufficient'; required: number; available: number }
  | { kind: 'filtered' }
  | { kind: 'rate-limited' }
  | { kind: 'no-signal' }
  | { kind: 'order-blocked'; signal: Signal }
  | { kind: 'risk-rejected'; signal: Signal; reason: RiskRejectionReason }
  | { kind: 'concurrency-violation'; message: string }
  | { kind: 'open-failed'; signal: Signal; error: string }
  | { kind: 'opened'; position: Position };

export interface TickReport {
  balance: number | null;
  evaluated: string[];
  closed: TradeRecord[];
}

export interface StopReport {
  abandoned: number;
  flattened: TradeRecord[];
}

export interface PositionStatus extends Position {
  lastPrice: number | null;
  unrealizedPnl: number | null;
}

export interface SymbolStatus {
  symbol: string;
  candles: number;
  lastClose: number | null;
  state: PositionState;
}

export interface EngineStatus {
  running: boolean;
  startingBalance: number | null;
  currentBalance: number | null;
  totalPnLPercent: number;
  openPositions: PositionStatus[];
  symbols: SymbolStatus[];
  risk: TradingStats;
  history: HistoryStats;
  rateLimit: TradingStatus;
}

type EntryDecision =
  | { kind: 'reserved'; reservation: OpenReservation; events: TradingEvent[] }
  | { kind: 'done'; outcome: CandleOutcome; events: TradingEvent[] };

export class TradingEngine extends EventEmitter {
  private logger: Logger;
  private now: Clock;
  private windows: PriceWindowStore;
  private indicators: IndicatorEngine;
  private signals: SignalGenerator;
  private marketFilter: MarketConditionFilter;
  private riskManager: RiskManager;
  private rateLimiter: RateLimiter;
  private lifecycle: PositionLifecycle;
  private lane = new SymbolLane();

  private inFlight: Set<Promise<unknown>> = new Set();
  private timer: NodeJS.Timeout | null = null;
  private accepting = false;
  private ticking = false;
  private startingBalance: number | null = null;
  private currentBalance: number | null = null;

  constructor(
    private readonly config: TradingConfig,
    private readonly ports: TradingPorts,
    options: TradingEngineOptions = {}
  ) {
    super();
    this.logger = options.logger ?? new Logger('TradingEngine', { level: config.logLevel });
    this.now = options.now ?? systemClock;

    this.indicators = new IndicatorEngine(config.indicators);
    const lookback = this.indicators.requiredLookback();
    if (config.windowCapacity < lookback) {
      throw new TradingError(
        TradingErrorCode.CONFIGURATION_ERROR,
        `windowCapacity ${config.windowCapacity} is below the indicator lookback ${lookback}`
      );
    }

    this.windows = new PriceWindowStore(config.windowCapacity, this.logger.child('PriceWindowStore'));
    this.signals = new SignalGenerator(
      { ...config.trading, rsiOversold: config.indicators.rsiOversold },
      this.logger.child('SignalGenerator')
    );
    this.marketFilter = new MarketConditionFilter(config.trading, this.logger.child('MarketConditionFilter'));
    this.riskManager = new RiskManager(config.risk, config.trading, {
      now: this.now,
      logger: this.logger.child('RiskManager')
    });
    this.rateLimiter = new RateLimiter(config.rateLimit, {
      now: this.now,
      logger: this.logger.child('RateLimiter')
    });
    this.lifecycle = new PositionLifecycle(
      { ...config.trading, ...config.indicators },
      { now: this.now, logger: this.logger.child('PositionLifecycle') }
    );
  }

  get isRunning(): boolean {
    return this.accepting;
  }

  /**
   * Seed windows from history, read the starting balance and start the
   * management timer
   */
  async start(): Promise<void> {
    if (this.accepting) {
      return;
    }

    this.logger.info('Starting trading engine', {
      symbols: this.config.symbols,
      checkInterval: this.config.checkInterval
    });

    await this.seedWindows();
    await this.refreshBalance();

    this.accepting = true;
    this.timer = setInterval(() => {
      this.tick().catch(error => this.logger.error('Management tick failed', error));
    }, this.config.checkInterval * 1000);

    this.logger.info('Trading engine started', { balance: this.currentBalance });
  }

  /**
   * Stop intake, wait for in-flight work up to the grace period and
   * optionally flatten what is still open
   */
  async stop(): Promise<StopReport> {
    this.accepting = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const graceMs = this.config.shutdownGracePeriod * 1000;
    const pending = Array.from(this.inFlight);
    let abandoned = 0;

    if (pending.length > 0) {
      this.logger.info(`Waiting for ${pending.length} in-flight operations`);
      let graceTimer: NodeJS.Timeout | undefined;
      const expired = new Promise<false>(resolve => {
        graceTimer = setTimeout(() => resolve(false), graceMs);
      });
      const settled = await Promise.race([Promise.allSettled(pending).then(() => true), expired]);
      clearTimeout(graceTimer);
      if (!settled) {
        abandoned = this.inFlight.size;
        this.logger.warn(`Abandoning ${abandoned} operations after ${this.config.shutdownGracePeriod}s grace period`);
      }
    }

    const flattened: TradeRecord[] = [];
    if (this.config.flattenOnShutdown) {
      for (const position of this.lifecycle.getOpenPositions()) {
        const trade = await this.flatten(position.symbol);
        if (trade) {
          flattened.push(trade);
        }
      }
    }

    this.logger.info('Trading engine stopped', {
      abandoned,
      flattened: flattened.length,
      stillOpen: this.lifecycle.openCount,
      queuedLaneTasks: this.lane.pending
    });
    return { abandoned, flattened };
  }

  /**
   * Handle one closed-candle event from the market-data feed
   */
  onCandleClosed(event: unknown): Promise<CandleOutcome> {
    if (!this.accepting) {
      return Promise.resolve<CandleOutcome>({ kind: 'stopped' });
    }
    return this.track(this.processCandle(event));
  }

  /**
   * Periodic management: balance refresh, then exit evaluation for every
   * open position
   */
  async tick(): Promise<TickReport> {
    if (this.ticking) {
      this.logger.debug('Previous tick still running, skipping');
      return { balance: this.currentBalance, evaluated: [], closed: [] };
    }

    this.ticking = true;
    try {
      const balance = await this.refreshBalance();
      const symbols = this.lifecycle
        .getOpenPositions()
        .map(position => position.symbol)
        .filter(symbol => this.lifecycle.getState(symbol) === PositionState.OPEN);

      const results = await Promise.all(symbols.map(symbol => this.track(this.manage(symbol))));
      const closed = results.filter((trade): trade is TradeRecord => trade !== null);

      return { balance, evaluated: symbols, closed };
    } finally {
      this.ticking = false;
    }
  }

  getStatus(): EngineStatus {
    const starting = this.startingBalance;
    const current = this.currentBalance;

    const openPositions = this.lifecycle.getOpenPositions().map(position => {
      const lastPrice = this.windows.has(position.symbol)
        ? this.windows.get(position.symbol).latest()?.close ?? null
        : null;
      return {
        ...position,
        lastPrice,
        unrealizedPnl: lastPrice === null ? null : this.lifecycle.unrealizedPnl(position.symbol, lastPrice)
      };
    });

    const symbols = this.windows.symbols().map(symbol => {
      const window = this.windows.get(symbol);
      return {
        symbol,
        candles: window.size,
        lastClose: window.latest()?.close ?? null,
        state: this.lifecycle.getState(symbol)
      };
    });

    return {
      running: this.accepting,
      startingBalance: starting,
      currentBalance: current,
      totalPnLPercent: starting && current !== null ? ((current - starting) / starting) * 100 : 0,
      openPositions,
      symbols,
      risk: this.riskManager.getTradingStats(),
      history: this.riskManager.getStats(),
      rateLimit: this.rateLimiter.getTradingStatus()
    };
  }

  // ==========================================================================
  // Entries
  // ==========================================================================

  private async processCandle(event: unknown): Promise<CandleOutcome> {
    const parsed = parseClosedCandle(event);
    if (!parsed.ok) {
      this.logger.warn('Discarding invalid candle event', { error: parsed.error });
      return { kind: 'invalid', error: parsed.error };
    }

    const candle = parsed.candle;
    const decision = await this.lane.run(candle.symbol, () => this.decideEntry(candle));
    await this.publishAll(decision.events);

    if (decision.kind === 'done') {
      return decision.outcome;
    }
    return this.executeEntry(decision.reservation);
  }

  /**
   * Everything up to the reservation, applied under the symbol's lane
   */
  private decideEntry(candle: Candle): EntryDecision {
    const symbol = candle.symbol;
    const done = (outcome: CandleOutcome, events: TradingEvent[] = []): EntryDecision => ({
      kind: 'done',
      outcome,
      events
    });

    const window = this.windows.get(symbol);
    const appended = window.append(candle);
    if (!appended.accepted) {
      if (appended.reason === 'stale') {
        this.logger.debug(`Stale candle for ${symbol}`, {
          timestamp: candle.timestamp,
          lastTimestamp: appended.lastTimestamp
        });
        return done({ kind: 'stale', lastTimestamp: appended.lastTimestamp });
      }
      return done({ kind: 'invalid', error: `Candle for ${symbol} routed to ${appended.expected}` });
    }

    const candles = window.snapshot();
    const result = this.indicators.compute(candles);
    if (result.status === 'insufficient') {
      this.logger.debug(`Insufficient data for ${symbol}`, {
        required: result.required,
        available: result.available
      });
      return done({ kind: 'insufficient', required: result.required, available: result.available });
    }

    if (!this.marketFilter.assess(symbol, candles, result.snapshot).proceed) {
      return done({ kind: 'filtered' });
    }

    if (!this.rateLimiter.canCheckSignal(symbol)) {
      return done({ kind: 'rate-limited' });
    }

    const { signal } = this.signals.evaluate({
      symbol,
      snapshot: result.snapshot,
      price: candle.close,
      hasOpenPosition: this.lifecycle.hasPosition(symbol),
      now: this.now()
    });
    if (!signal) {
      return done({ kind: 'no-signal' });
    }

    this.rateLimiter.registerSignal(symbol);
    const events: TradingEvent[] = [{ type: 'signalGenerated', signal }];

    if (!this.rateLimiter.canPlaceOrder(symbol)) {
      return done({ kind: 'order-blocked', signal }, events);
    }

    const risk = this.riskManager.validate(signal, this.lifecycle.openCount, this.currentBalance ?? 0);
    if (!risk.accepted) {
      events.push({ type: 'riskRejected', signal, reason: risk.reason, message: risk.message });
      return done({ kind: 'risk-rejected', signal, reason: risk.reason }, events);
    }

    try {
      const reservation = this.lifecycle.beginOpen(signal, risk.quantity, {
        stopLoss: risk.stopLoss,
        takeProfit: risk.takeProfit
      });
      // In-flight entries count toward the spacing and daily cap across symbols
      this.riskManager.reserveTrade(symbol, this.now());
      this.rateLimiter.reserveOrder(symbol);
      return { kind: 'reserved', reservation, events };
    } catch (error) {
      if (isTradingError(error, TradingErrorCode.CONCURRENCY_VIOLATION)) {
        this.logger.error(`Concurrency anomaly while opening ${symbol}`, error);
        return done({ kind: 'concurrency-violation', message: error.message }, events);
      }
      throw error;
    }
  }

  /**
   * Persist the signal and place the order outside the lane, then commit
   * or release the reservation
   */
  private async executeEntry(reservation: OpenReservation): Promise<CandleOutcome> {
    const { signal, symbol } = reservation;

    try {
      await this.ports.persister?.saveSignal(signal);
    } catch (error) {
      await this.lane.run(symbol, () => this.abortEntry(reservation));
      return this.entryFailed(signal, 'saveSignal', errorMessage(error));
    }

    const result = await this.placeOrder({ symbol, side: signal.side, quantity: reservation.quantity });
    if (!result.ok) {
      await this.lane.run(symbol, () => this.abortEntry(reservation));
      return this.entryFailed(signal, 'placeOrder', result.error);
    }

    const position = await this.lane.run(symbol, () => {
      const opened = this.lifecycle.commitOpen(reservation, result.orderId);
      this.rateLimiter.registerOrder(symbol);
      this.riskManager.registerTradeOpened(symbol, opened.openedAt);
      return opened;
    });

    await this.publish({ type: 'tradeOpened', position });
    return { kind: 'opened', position };
  }

  private abortEntry(reservation: OpenReservation): void {
    this.lifecycle.abortOpen(reservation);
    this.riskManager.releaseTrade(reservation.symbol);
    this.rateLimiter.releaseOrder(reservation.symbol);
  }

  private async entryFailed(signal: Signal, operation: string, message: string): Promise<CandleOutcome> {
    this.logger.error(`Failed to open ${signal.symbol}: ${operation}`, message);
    await this.publish({ type: 'error', symbol: signal.symbol, operation, message });
    return { kind: 'open-failed', signal, error: message };
  }

  // ==========================================================================
  // Exits
  // ==========================================================================

  private async manage(symbol: string): Promise<TradeRecord | null> {
    const price = await this.currentPrice(symbol);
    if (price === null) {
      this.logger.warn(`No price available for ${symbol}, skipping management`);
      return null;
    }

    const reservation = await this.lane.run(symbol, () => {
      if (this.lifecycle.getState(symbol) !== PositionState.OPEN) {
        return null;
      }
      const reason = this.lifecycle.evaluateExit(symbol, price, this.latestSnapshot(symbol), this.now());
      return reason ? this.lifecycle.beginClose(symbol, reason, price) : null;
    });

    return reservation ? this.executeClose(reservation) : null;
  }

  private async flatten(symbol: string): Promise<TradeRecord | null> {
    const price = await this.currentPrice(symbol);
    if (price === null) {
      this.logger.warn(`Cannot flatten ${symbol} without a price`);
      return null;
    }

    const reservation = await this.lane.run(symbol, () =>
      this.lifecycle.getState(symbol) === PositionState.OPEN
        ? this.lifecycle.beginClose(symbol, ExitReason.SHUTDOWN, price)
        : null
    );
    return reservation ? this.executeClose(reservation) : null;
  }

  private async executeClose(reservation: CloseReservation): Promise<TradeRecord | null> {
    const { position, symbol } = reservation;

    const result = await this.placeOrder({
      symbol,
      side: oppositeSide(position.side),
      quantity: position.quantity
    });
    if (!result.ok) {
      await this.lane.run(symbol, () => this.lifecycle.abortClose(reservation));
      this.logger.error(`Failed to close ${symbol}`, result.error, { reason: reservation.reason });
      await this.publish({ type: 'error', symbol, operation: 'closePosition', message: result.error });
      return null;
    }

    const trade = await this.lane.run(symbol, () => {
      const closed = this.lifecycle.commitClose(reservation, this.now());
      this.riskManager.recordResult(closed.pnl);
      return closed;
    });

    try {
      await this.ports.persister?.saveTrade(trade);
    } catch (error) {
      this.logger.error(`Failed to save trade for ${symbol}`, error);
      await this.publish({ type: 'error', symbol, operation: 'saveTrade', message: errorMessage(error) });
    }

    await this.publish({ type: 'tradeClosed', trade });
    return trade;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private latestSnapshot(symbol: string): IndicatorSnapshot | null {
    const result = this.indicators.compute(this.windows.get(symbol).snapshot());
    return result.status === 'ready' ? result.snapshot : null;
  }

  private async currentPrice(symbol: string): Promise<number | null> {
    try {
      const price = await this.ports.priceFeed.getCurrentPrice(symbol);
      if (price !== null && price > 0) {
        return price;
      }
    } catch (error) {
      this.logger.warn(`Price feed failed for ${symbol}, using last close`, { error: errorMessage(error) });
    }
    return this.windows.has(symbol) ? this.windows.get(symbol).latest()?.close ?? null : null;
  }

  private async placeOrder(request: OrderRequest): Promise<OrderResult> {
    try {
      return await this.ports.executor.placeOrder(request);
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  /**
   * Refresh the account balance; a failed read keeps the previous value
   */
  private async refreshBalance(): Promise<number | null> {
    try {
      const balance = await this.ports.account.getBalance();
      if (balance === null) {
        this.logger.warn('Account balance unavailable, keeping previous value');
      } else {
        this.currentBalance = balance;
        this.startingBalance ??= balance;
      }
    } catch (error) {
      this.logger.error('Failed to refresh account balance', error);
      await this.publish({ type: 'error', operation: 'getBalance', message: errorMessage(error) });
    }
    return this.currentBalance;
  }

  private async seedWindows(): Promise<void> {
    const { priceFeed } = this.ports;
    if (!priceFeed.getHistoricalCandles) {
      return;
    }

    for (const symbol of this.config.symbols) {
      try {
        const candles = await priceFeed.getHistoricalCandles(symbol, this.config.windowCapacity);
        await this.lane.run(symbol, () => this.windows.seed(symbol, candles));
      } catch (error) {
        this.logger.error(`Failed to load history for ${symbol}`, error);
        await this.publish({ type: 'error', symbol, operation: 'getHistoricalCandles', message: errorMessage(error) });
      }
    }
  }

  private track<T>(operation: Promise<T>): Promise<T> {
    this.inFlight.add(operation);
    const release = () => {
      this.inFlight.delete(operation);
    };
    void operation.then(release, release);
    return operation;
  }

  private async publishAll(events: TradingEvent[]): Promise<void> {
    for (const event of events) {
      await this.publish(event);
    }
  }

  private async publish(event: TradingEvent): Promise<void> {
    this.emit(`trading:${event.type}`, event);

    if (!this.ports.notifier) {
      return;
    }
    try {
      await this.ports.notifier.notify(event);
    } catch (error) {
      this.logger.error(`Notifier failed for ${event.type}`, error);
    }
  }
}
