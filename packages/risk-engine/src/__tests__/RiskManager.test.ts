import { describe, it, expect, beforeEach } from '@jest/globals';
import { DEFAULT_CONFIG, RiskSettings } from '@tickwise/config';
import { OrderSide, Signal } from '@tickwise/types';
import { ManualClock } from '@tickwise/testing';
import { RiskManager } from '../RiskManager';

const T0 = new Date(2026, 0, 5, 10, 0).getTime();

function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    id: 'sig_test',
    symbol: 'BTCUSDT',
    side: OrderSide.BUY,
    price: 50,
    strength: 80,
    stopLoss: 49.65,
    takeProfit: 50.9,
    generatedAt: T0,
    ...overrides
  };
}

describe('RiskManager', () => {
  let clock: ManualClock;

  const create = (risk: Partial<RiskSettings> = {}, maxRiskPercent = DEFAULT_CONFIG.trading.maxRiskPercent) =>
    new RiskManager(
      { ...DEFAULT_CONFIG.risk, ...risk },
      { ...DEFAULT_CONFIG.trading, maxRiskPercent },
      { now: clock.now }
    );

  beforeEach(() => {
    clock = new ManualClock(T0);
  });

  describe('size', () => {
    it('should size a fraction of the balance at the entry price', () => {
      const manager = create();

      expect(manager.size(50, null, 1000)).toBe(1);
      expect(manager.size(50, 49.65, 1000)).toBe(1);
    });

    it('should clamp the default fraction to the configured range', () => {
      expect(create({ defaultPositionSize: 0.5 }).size(50, null, 1000)).toBe(2);
      expect(create({ defaultPositionSize: 0.001 }).size(50, null, 1000)).toBe(0.2);
    });

    it('should use the fixed lot when enabled', () => {
      expect(create({ useFixedLot: true }).size(50, null, 1000)).toBe(2);
    });

    it('should cap the quantity by the loss allowed down to the stop', () => {
      const manager = create();

      expect(manager.size(100, 90, 1000)).toBe(0.5);
      expect(manager.size(100, 50, 1000)).toBe(0.4);
    });

    it('should return zero for non-positive inputs', () => {
      const manager = create();

      expect(manager.size(0, null, 1000)).toBe(0);
      expect(manager.size(50, null, 0)).toBe(0);
      expect(manager.size(50, null, -10)).toBe(0);
      expect(manager.size(50, 0, 1000)).toBe(0);
    });
  });

  describe('validate', () => {
    it('should accept a signal within every limit', () => {
      const decision = create().validate(makeSignal(), 0, 1000);

      expect(decision).toEqual({ accepted: true, quantity: 1, stopLoss: 49.65, takeProfit: 50.9 });
    });

    it('should reject at the open position limit', () => {
      const decision = create().validate(makeSignal(), 3, 1000);

      expect(decision.accepted).toBe(false);
      expect(!decision.accepted && decision.reason).toBe('MAX_OPEN_POSITIONS');
    });

    it('should space trades by the minimum time between them', () => {
      const manager = create();
      manager.registerTradeOpened('BTCUSDT', T0);

      clock.set(T0 + 299_000);
      const early = manager.validate(makeSignal(), 0, 1000);
      clock.set(T0 + 300_000);
      const onTime = manager.validate(makeSignal(), 0, 1000);

      expect(!early.accepted && early.reason).toBe('MIN_TIME_BETWEEN_TRADES');
      expect(onTime.accepted).toBe(true);
    });

    it('should space trades behind an entry that is still in flight', () => {
      const manager = create();
      manager.reserveTrade('BTCUSDT', T0);

      const blocked = manager.validate(makeSignal({ symbol: 'ETHUSDT' }), 1, 1000);
      expect(!blocked.accepted && blocked.reason).toBe('MIN_TIME_BETWEEN_TRADES');

      manager.releaseTrade('BTCUSDT');
      expect(manager.validate(makeSignal({ symbol: 'ETHUSDT' }), 0, 1000).accepted).toBe(true);
    });

    it('should keep the spacing once a reserved trade is filled', () => {
      const manager = create();
      manager.reserveTrade('BTCUSDT', T0);
      clock.set(T0 + 60_000);
      manager.registerTradeOpened('BTCUSDT', T0 + 60_000);

      clock.set(T0 + 300_000);
      const early = manager.validate(makeSignal({ symbol: 'ETHUSDT' }), 1, 1000);
      clock.set(T0 + 360_000);
      const onTime = manager.validate(makeSignal({ symbol: 'ETHUSDT' }), 1, 1000);

      expect(!early.accepted && early.reason).toBe('MIN_TIME_BETWEEN_TRADES');
      expect(onTime.accepted).toBe(true);
    });

    it('should stop trading once realized losses reach the daily limit', () => {
      const manager = create();
      manager.recordResult(-49);
      expect(manager.validate(makeSignal(), 0, 1000).accepted).toBe(true);

      manager.recordResult(-1);
      const decision = manager.validate(makeSignal(), 0, 1000);

      expect(!decision.accepted && decision.reason).toBe('DAILY_LOSS_LIMIT');
    });

    it('should not count profits toward the daily loss limit', () => {
      const manager = create();
      manager.recordResult(500);

      expect(manager.validate(makeSignal(), 0, 1000).accepted).toBe(true);
    });

    it('should reject a zero size', () => {
      const decision = create().validate(makeSignal(), 0, 0);

      expect(!decision.accepted && decision.reason).toBe('INVALID_SIZE');
    });

    it('should reject a position worth more than the notional cap', () => {
      const manager = create({ useFixedLot: true, fixedLotSize: 200 });

      const decision = manager.validate(makeSignal(), 0, 1000);

      expect(decision).toEqual({
        accepted: false,
        reason: 'POSITION_NOTIONAL_CAP',
        message: 'Position value 200.00 exceeds cap 100.00'
      });
    });

    it('should reject a position risking more than the allowed percent', () => {
      const manager = create({ maxPositionLoss: 0 }, 1);

      const decision = manager.validate(makeSignal({ stopLoss: 35 }), 0, 1000);

      expect(!decision.accepted && decision.reason).toBe('POSITION_RISK_LIMIT');
    });

    it('should replace signal levels when configured to', () => {
      const decision = create({ overrideSignalLevels: true }).validate(makeSignal(), 0, 1000);

      expect(decision.accepted).toBe(true);
      if (decision.accepted) {
        expect(decision.stopLoss).toBeCloseTo(49.5, 9);
        expect(decision.takeProfit).toBeCloseTo(51, 9);
      }
    });
  });

  describe('daily stats', () => {
    it('should count wins and losses for the day', () => {
      const manager = create();
      manager.recordResult(30);
      manager.recordResult(-10);
      manager.recordResult(0);

      expect(manager.getDailyStats()).toEqual({
        date: '2026-01-05',
        tradeCount: 3,
        realizedPnL: 20,
        wins: 1,
        losses: 2
      });
    });

    it('should count a result by its stated outcome', () => {
      const manager = create();
      manager.recordResult(0.5, 'LOSS');
      manager.recordResult(-0.5, 'WIN');

      expect(manager.getDailyStats()).toMatchObject({ wins: 1, losses: 1, tradeCount: 2 });
      expect(manager.getStats()).toMatchObject({ winRate: 50, avgWin: -0.5, avgLoss: 0.5 });
    });

    it('should reset once when the local date changes', () => {
      const manager = create();
      manager.recordResult(-10);

      clock.set(new Date(2026, 0, 6, 0, 1).getTime());
      manager.recordResult(5);
      clock.set(new Date(2026, 0, 6, 15, 0).getTime());
      manager.recordResult(7);

      expect(manager.getDailyStats()).toEqual({
        date: '2026-01-06',
        tradeCount: 2,
        realizedPnL: 12,
        wins: 2,
        losses: 0
      });
    });

    it('should summarize history and today', () => {
      const manager = create();
      manager.recordResult(30);
      manager.recordResult(-10);
      manager.recordResult(20);

      expect(manager.getStats()).toEqual({
        winRate: (2 / 3) * 100,
        avgWin: 25,
        avgLoss: -10,
        totalTrades: 3,
        totalPnL: 40
      });
      expect(manager.getTradingStats().winRate).toBe((2 / 3) * 100);
    });

    it('should bound the trade history', () => {
      const manager = create({ maxTradeHistory: 2 });
      manager.recordResult(10);
      manager.recordResult(-5);
      manager.recordResult(-5);

      expect(manager.getStats().totalTrades).toBe(2);
      expect(manager.getStats().totalPnL).toBe(-10);
      expect(manager.getDailyStats().tradeCount).toBe(3);
    });
  });

  describe('levels', () => {
    it('should derive stops from the configured percent and volatility', () => {
      const manager = create();

      expect(manager.calculateStopLoss(100, OrderSide.BUY)).toBeCloseTo(99, 9);
      expect(manager.calculateStopLoss(100, OrderSide.SELL, 0.005)).toBeCloseTo(102, 9);
      expect(manager.calculateStopLoss(100, OrderSide.BUY, 0.5)).toBeCloseTo(97, 9);
    });

    it('should derive take-profits from a risk reward ratio when given', () => {
      const manager = create();

      expect(manager.calculateTakeProfit(100, OrderSide.BUY)).toBeCloseTo(102, 9);
      expect(manager.calculateTakeProfit(100, OrderSide.BUY, 3)).toBeCloseTo(103, 9);
      expect(manager.calculateTakeProfit(100, OrderSide.SELL, 3)).toBeCloseTo(97, 9);
    });

    it('should measure risk down to the stop', () => {
      expect(create().calculatePositionRisk(2, 100, 97)).toBe(6);
    });
  });
});
