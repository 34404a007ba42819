/**
 * Risk Manager
 *
 * Gates signals against the daily loss budget, open-position and spacing
 * limits, sizes accepted trades and keeps today's realized results.
 *
 * Every method is synchronous, so each call updates DailyRiskStats as one
 * step of the event loop.
 */

import { RiskSettings, TradingSettings } from '@tickwise/config';
import {
  DailyRiskStats,
  OrderSide,
  RiskRejectionReason,
  Signal,
  TradeOutcome
} from '@tickwise/types';
import { Clock, Logger, localDateKey, systemClock } from '@tickwise/utils';
import { HistoryStats, RiskDecision, TradeHistoryEntry, TradingStats } from './types';

// Notional comparisons tolerate floating point noise from price/quantity math
const NOTIONAL_TOLERANCE = 1e-9;

export type RiskTradingSettings = Pick<
  TradingSettings,
  'maxRiskPercent' | 'stopLossPercent' | 'takeProfitPercent'
>;

export interface RiskManagerOptions {
  now?: Clock;
  logger?: Logger;
}

export class RiskManager {
  private logger: Logger;
  private now: Clock;
  private dailyStats: DailyRiskStats;
  private tradeHistory: TradeHistoryEntry[] = [];
  private lastTradeTime: number | null = null;
  // Entries accepted but not yet filled, keyed by symbol
  private pendingTrades: Map<string, number> = new Map();

  constructor(
    private readonly settings: RiskSettings,
    private readonly trading: RiskTradingSettings,
    options: RiskManagerOptions = {}
  ) {
    this.logger = options.logger ?? new Logger('RiskManager');
    this.now = options.now ?? systemClock;
    this.dailyStats = this.emptyStats(localDateKey(this.now()));
  }

  /**
   * Decide whether a signal may be traded and at what size. Checks run in a
   * fixed order and the first failing one is reported.
   */
  validate(signal: Signal, openPositionCount: number, accountBalance: number): RiskDecision {
    this.rollDay();

    const realizedLoss = Math.max(0, -this.dailyStats.realizedPnL);
    const dailyLimit = this.settings.maxDailyLoss * accountBalance;
    if (realizedLoss > 0 && realizedLoss >= dailyLimit) {
      return this.reject(
        signal,
        'DAILY_LOSS_LIMIT',
        `Daily loss ${realizedLoss.toFixed(2)} reached limit ${dailyLimit.toFixed(2)}`
      );
    }

    if (openPositionCount >= this.settings.maxOpenPositions) {
      return this.reject(
        signal,
        'MAX_OPEN_POSITIONS',
        `Open positions ${openPositionCount} at limit ${this.settings.maxOpenPositions}`
      );
    }

    const lastTradeTime = this.latestTradeTime();
    if (lastTradeTime !== null) {
      const elapsed = (this.now() - lastTradeTime) / 1000;
      if (elapsed < this.settings.minTimeBetweenTrades) {
        return this.reject(
          signal,
          'MIN_TIME_BETWEEN_TRADES',
          `Only ${Math.floor(elapsed)}s since last trade, need ${this.settings.minTimeBetweenTrades}s`
        );
      }
    }

    const { stopLoss, takeProfit } = this.resolveLevels(signal);
    const quantity = this.size(signal.price, stopLoss, accountBalance);
    if (quantity <= 0) {
      return this.reject(signal, 'INVALID_SIZE', 'Position size calculated as zero');
    }

    const notional = quantity * signal.price;
    const notionalCap = this.settings.maxPositionSize * accountBalance;
    if (notional > notionalCap * (1 + NOTIONAL_TOLERANCE)) {
      return this.reject(
        signal,
        'POSITION_NOTIONAL_CAP',
        `Position value ${notional.toFixed(2)} exceeds cap ${notionalCap.toFixed(2)}`
      );
    }

    const risk = this.calculatePositionRisk(quantity, signal.price, stopLoss);
    const riskLimit = (this.trading.maxRiskPercent / 100) * accountBalance;
    if (risk > riskLimit * (1 + NOTIONAL_TOLERANCE)) {
      return this.reject(
        signal,
        'POSITION_RISK_LIMIT',
        `Risk to stop ${risk.toFixed(2)} exceeds ${riskLimit.toFixed(2)}`
      );
    }

    this.logger.debug(`Risk check passed for ${signal.symbol}`, { quantity, stopLoss, takeProfit });
    return { accepted: true, quantity, stopLoss, takeProfit };
  }

  /**
   * Quantity for an entry: a fixed notional lot, or a clamped fraction of the
   * balance, further capped by the loss allowed down to the stop
   */
  size(entryPrice: number, stopLoss: number | null, balance: number): number {
    if (!(entryPrice > 0) || !(balance > 0)) {
      return 0;
    }

    let quantity: number;
    if (this.settings.useFixedLot) {
      quantity = this.settings.fixedLotSize / entryPrice;
    } else {
      const fraction = Math.min(
        Math.max(this.settings.defaultPositionSize, this.settings.minPositionSize),
        this.settings.maxPositionSize
      );
      quantity = (balance * fraction) / entryPrice;
    }

    if (stopLoss !== null && this.settings.maxPositionLoss > 0) {
      if (!(stopLoss > 0)) {
        return 0;
      }
      const perUnitRisk = Math.abs(entryPrice - stopLoss);
      if (perUnitRisk > 0) {
        quantity = Math.min(quantity, (this.settings.maxPositionLoss * balance) / perUnitRisk);
      }
    }

    return quantity;
  }

  /**
   * Hold the trade spacing for an entry whose order is still in flight, so
   * entries on other symbols see it before the fill is registered
   */
  reserveTrade(symbol: string, time: number = this.now()): void {
    this.pendingTrades.set(symbol, time);
  }

  releaseTrade(symbol: string): void {
    this.pendingTrades.delete(symbol);
  }

  registerTradeOpened(symbol: string, time: number = this.now()): void {
    this.pendingTrades.delete(symbol);
    this.lastTradeTime = time;
  }

  /**
   * Record a closed trade in today's stats and the bounded history
   */
  recordResult(pnl: number, outcome: TradeOutcome = pnl > 0 ? 'WIN' : 'LOSS'): void {
    this.rollDay();

    this.dailyStats.tradeCount++;
    this.dailyStats.realizedPnL += pnl;
    if (outcome === 'WIN') {
      this.dailyStats.wins++;
    } else {
      this.dailyStats.losses++;
    }

    this.tradeHistory.push({ timestamp: this.now(), pnl, outcome });
    if (this.tradeHistory.length > this.settings.maxTradeHistory) {
      this.tradeHistory.splice(0, this.tradeHistory.length - this.settings.maxTradeHistory);
    }

    this.logger.info('Trade result recorded', {
      pnl,
      outcome,
      dailyPnL: this.dailyStats.realizedPnL,
      dailyTrades: this.dailyStats.tradeCount
    });
  }

  calculateStopLoss(entryPrice: number, side: OrderSide, volatility?: number): number {
    let percent = this.trading.stopLossPercent / 100;
    if (volatility) {
      percent += Math.min(volatility * 2, 0.02);
    }
    return side === OrderSide.BUY ? entryPrice * (1 - percent) : entryPrice * (1 + percent);
  }

  /**
   * Take-profit at `riskRewardRatio` times the stop distance when given,
   * otherwise at the configured take-profit percent
   */
  calculateTakeProfit(entryPrice: number, side: OrderSide, riskRewardRatio?: number): number {
    const percent =
      riskRewardRatio !== undefined
        ? (this.trading.stopLossPercent / 100) * riskRewardRatio
        : this.trading.takeProfitPercent / 100;
    return side === OrderSide.BUY ? entryPrice * (1 + percent) : entryPrice * (1 - percent);
  }

  calculatePositionRisk(quantity: number, price: number, stopLoss: number): number {
    return Math.abs(price - stopLoss) * quantity;
  }

  getDailyStats(): DailyRiskStats {
    this.rollDay();
    return { ...this.dailyStats };
  }

  getTradingStats(): TradingStats {
    const daily = this.getDailyStats();
    return {
      daily,
      winRate: daily.tradeCount > 0 ? (daily.wins / daily.tradeCount) * 100 : 0,
      totalTrades: daily.tradeCount,
      totalPnL: daily.realizedPnL
    };
  }

  getStats(): HistoryStats {
    const total = this.tradeHistory.length;
    if (total === 0) {
      return { winRate: 0, avgWin: 0, avgLoss: 0, totalTrades: 0, totalPnL: 0 };
    }

    const wins = this.tradeHistory.filter(entry => entry.outcome === 'WIN');
    const losses = this.tradeHistory.filter(entry => entry.outcome !== 'WIN');
    const sum = (entries: TradeHistoryEntry[]) => entries.reduce((acc, entry) => acc + entry.pnl, 0);

    return {
      winRate: (wins.length / total) * 100,
      avgWin: wins.length > 0 ? sum(wins) / wins.length : 0,
      avgLoss: losses.length > 0 ? sum(losses) / losses.length : 0,
      totalTrades: total,
      totalPnL: sum(this.tradeHistory)
    };
  }

  private latestTradeTime(): number | null {
    let latest = this.lastTradeTime;
    for (const time of this.pendingTrades.values()) {
      if (latest === null || time > latest) {
        latest = time;
      }
    }
    return latest;
  }

  private resolveLevels(signal: Signal): { stopLoss: number; takeProfit: number } {
    if (!this.settings.overrideSignalLevels) {
      return { stopLoss: signal.stopLoss, takeProfit: signal.takeProfit };
    }
    return {
      stopLoss: this.calculateStopLoss(signal.price, signal.side),
      takeProfit: this.calculateTakeProfit(signal.price, signal.side)
    };
  }

  private rollDay(): void {
    const today = localDateKey(this.now());
    if (today !== this.dailyStats.date) {
      this.logger.info('New trading day, resetting daily risk stats', {
        previous: this.dailyStats.date,
        today
      });
      this.dailyStats = this.emptyStats(today);
    }
  }

  private emptyStats(date: string): DailyRiskStats {
    return { date, tradeCount: 0, realizedPnL: 0, wins: 0, losses: 0 };
  }

  private reject(signal: Signal, reason: RiskRejectionReason, message: string): RiskDecision {
    this.logger.info(`Signal rejected for ${signal.symbol}: ${reason}`, { message });
    return { accepted: false, reason, message };
  }
}
