/**
 * Position Lifecycle
 *
 * Owns the single position a symbol may hold and moves it through
 * NONE -> OPENING -> OPEN -> CLOSING -> NONE. OPENING and CLOSING are
 * reservations held while an order is in flight; the order outcome either
 * commits or aborts them.
 */

import { IndicatorSettings, TradingSettings } from '@tickwise/config';
import {
  ExitReason,
  IndicatorSnapshot,
  OrderSide,
  Position,
  Signal,
  TradeRecord,
  TradingError,
  TradingErrorCode
} from '@tickwise/types';
import { Clock, Logger, generateId, systemClock } from '@tickwise/utils';

export enum PositionState {
  NONE = 'NONE',
  OPENING = 'OPENING',
  OPEN = 'OPEN',
  CLOSING = 'CLOSING'
}

export type PositionLifecycleSettings = Pick<
  TradingSettings,
  'maxPositionTime' | 'enableTrailingStop' | 'trailingStopPercent'
> &
  Pick<IndicatorSettings, 'rsiOverbought' | 'rsiOversold'>;

export interface OpenReservation {
  readonly kind: 'open';
  readonly symbol: string;
  readonly signal: Signal;
  readonly quantity: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
}

export interface CloseReservation {
  readonly kind: 'close';
  readonly symbol: string;
  readonly position: Position;
  readonly reason: ExitReason;
  readonly price: number;
}

export interface ProtectiveLevels {
  stopLoss: number;
  takeProfit: number;
}

export interface PositionLifecycleOptions {
  now?: Clock;
  logger?: Logger;
}

interface SymbolSlot {
  state: PositionState;
  reservation?: OpenReservation | CloseReservation;
  position?: Position;
}

export function computePnl(side: OrderSide, entryPrice: number, exitPrice: number, quantity: number): number {
  return side === OrderSide.BUY
    ? (exitPrice - entryPrice) * quantity
    : (entryPrice - exitPrice) * quantity;
}

export class PositionLifecycle {
  private slots: Map<string, SymbolSlot> = new Map();
  private logger: Logger;
  private now: Clock;

  constructor(private readonly settings: PositionLifecycleSettings, options: PositionLifecycleOptions = {}) {
    this.logger = options.logger ?? new Logger('PositionLifecycle');
    this.now = options.now ?? systemClock;
  }

  getState(symbol: string): PositionState {
    return this.slots.get(symbol)?.state ?? PositionState.NONE;
  }

  /**
   * Reserve the symbol for an entry. Throws CONCURRENCY_VIOLATION when the
   * symbol already has a position or a pending order.
   */
  beginOpen(signal: Signal, quantity: number, levels?: ProtectiveLevels): OpenReservation {
    const state = this.getState(signal.symbol);
    if (state !== PositionState.NONE) {
      throw new TradingError(
        TradingErrorCode.CONCURRENCY_VIOLATION,
        `Cannot open ${signal.symbol}: position state is ${state}`,
        { symbol: signal.symbol, state }
      );
    }
    if (!(quantity > 0)) {
      throw new TradingError(TradingErrorCode.VALIDATION, `Invalid quantity ${quantity} for ${signal.symbol}`);
    }

    const reservation: OpenReservation = {
      kind: 'open',
      symbol: signal.symbol,
      signal,
      quantity,
      stopLoss: levels?.stopLoss ?? signal.stopLoss,
      takeProfit: levels?.takeProfit ?? signal.takeProfit
    };

    this.slots.set(signal.symbol, { state: PositionState.OPENING, reservation });
    this.logger.debug(`Reserved ${signal.symbol} for opening`, { side: signal.side, quantity });
    return reservation;
  }

  commitOpen(reservation: OpenReservation, orderId: string, openedAt: number = this.now()): Position {
    this.requireReservation(reservation, PositionState.OPENING);
    const { signal } = reservation;

    const position: Position = {
      id: generateId('pos'),
      symbol: signal.symbol,
      side: signal.side,
      entryPrice: signal.price,
      quantity: reservation.quantity,
      stopLoss: reservation.stopLoss,
      takeProfit: reservation.takeProfit,
      openedAt,
      signalStrength: signal.strength,
      orderId
    };

    this.slots.set(signal.symbol, {
      state: PositionState.OPEN,
      position
    });

    this.logger.info(`Opened ${signal.side} position on ${signal.symbol}`, {
      entryPrice: position.entryPrice,
      quantity: position.quantity,
      stopLoss: position.stopLoss,
      takeProfit: position.takeProfit,
      orderId
    });
    return position;
  }

  abortOpen(reservation: OpenReservation): void {
    this.requireReservation(reservation, PositionState.OPENING);
    this.slots.delete(reservation.symbol);
    this.logger.warn(`Released ${reservation.symbol} after failed open`);
  }

  /**
   * First matching exit in priority order StopLoss, TakeProfit, MaxTime,
   * TechnicalExit. Without an exit the trailing stop may tighten.
   */
  evaluateExit(
    symbol: string,
    price: number,
    snapshot: IndicatorSnapshot | null,
    now: number = this.now()
  ): ExitReason | null {
    const slot = this.slots.get(symbol);
    if (!slot || slot.state !== PositionState.OPEN || !slot.position) {
      return null;
    }

    const position = slot.position;
    const long = position.side === OrderSide.BUY;

    if (long ? price <= position.stopLoss : price >= position.stopLoss) {
      return ExitReason.STOP_LOSS;
    }
    if (long ? price >= position.takeProfit : price <= position.takeProfit) {
      return ExitReason.TAKE_PROFIT;
    }
    if (now - position.openedAt > this.settings.maxPositionTime * 60_000) {
      return ExitReason.MAX_TIME;
    }
    if (snapshot && this.isTechnicalExit(position.side, snapshot)) {
      return ExitReason.TECHNICAL_EXIT;
    }

    if (this.settings.enableTrailingStop) {
      this.trail(slot, position, price);
    }
    return null;
  }

  beginClose(symbol: string, reason: ExitReason, price: number): CloseReservation {
    const slot = this.slots.get(symbol);
    if (!slot || slot.state !== PositionState.OPEN || !slot.position) {
      throw new TradingError(
        TradingErrorCode.CONCURRENCY_VIOLATION,
        `Cannot close ${symbol}: position state is ${this.getState(symbol)}`,
        { symbol, state: this.getState(symbol) }
      );
    }

    const reservation: CloseReservation = { kind: 'close', symbol, position: slot.position, reason, price };
    slot.state = PositionState.CLOSING;
    slot.reservation = reservation;
    return reservation;
  }

  commitClose(reservation: CloseReservation, closedAt: number = this.now()): TradeRecord {
    this.requireReservation(reservation, PositionState.CLOSING);
    const { position, price, reason } = reservation;

    const trade: TradeRecord = {
      positionId: position.id,
      symbol: position.symbol,
      side: position.side,
      entryPrice: position.entryPrice,
      exitPrice: price,
      quantity: position.quantity,
      pnl: computePnl(position.side, position.entryPrice, price, position.quantity),
      openedAt: position.openedAt,
      closedAt,
      reason,
      signalStrength: position.signalStrength
    };

    this.slots.delete(position.symbol);
    this.logger.info(`Closed ${position.symbol} position: ${reason}`, {
      entryPrice: position.entryPrice,
      exitPrice: price,
      pnl: trade.pnl
    });
    return trade;
  }

  abortClose(reservation: CloseReservation): void {
    const slot = this.requireReservation(reservation, PositionState.CLOSING);
    slot.state = PositionState.OPEN;
    slot.reservation = undefined;
    this.logger.warn(`Close of ${reservation.symbol} failed, position stays open`);
  }

  getPosition(symbol: string): Position | undefined {
    return this.slots.get(symbol)?.position;
  }

  getOpenPositions(): Position[] {
    const positions: Position[] = [];
    for (const slot of this.slots.values()) {
      if (slot.position) {
        positions.push(slot.position);
      }
    }
    return positions;
  }

  /**
   * Symbols holding a position or a pending order; all count toward the
   * open-position limit
   */
  get openCount(): number {
    return this.slots.size;
  }

  hasPosition(symbol: string): boolean {
    return this.getState(symbol) !== PositionState.NONE;
  }

  unrealizedPnl(symbol: string, price: number): number | null {
    const position = this.getPosition(symbol);
    if (!position) {
      return null;
    }
    return computePnl(position.side, position.entryPrice, price, position.quantity);
  }

  private isTechnicalExit(side: OrderSide, snapshot: IndicatorSnapshot): boolean {
    if (side === OrderSide.BUY) {
      return (
        snapshot.rsi > this.settings.rsiOverbought ||
        snapshot.macd < snapshot.macdSignal ||
        snapshot.close < snapshot.emaShort
      );
    }
    return (
      snapshot.rsi < this.settings.rsiOversold ||
      snapshot.macd > snapshot.macdSignal ||
      snapshot.close > snapshot.emaShort
    );
  }

  private trail(slot: SymbolSlot, position: Position, price: number): void {
    const offset = this.settings.trailingStopPercent / 100;
    const long = position.side === OrderSide.BUY;

    const candidate = long ? price * (1 - offset) : price * (1 + offset);
    const tighter = long ? candidate > position.stopLoss : candidate < position.stopLoss;
    if (!tighter) {
      return;
    }

    slot.position = { ...position, stopLoss: candidate };
    this.logger.debug(`Trailing stop moved for ${position.symbol}`, {
      from: position.stopLoss,
      to: candidate
    });
  }

  private requireReservation(
    reservation: OpenReservation | CloseReservation,
    expected: PositionState
  ): SymbolSlot {
    const slot = this.slots.get(reservation.symbol);
    if (!slot || slot.state !== expected || slot.reservation !== reservation) {
      throw new TradingError(
        TradingErrorCode.CONCURRENCY_VIOLATION,
        `Stale ${reservation.kind} reservation for ${reservation.symbol}`,
        { symbol: reservation.symbol, state: this.getState(reservation.symbol) }
      );
    }
    return slot;
  }
}
