/**
 * @tickwise/types - Shared TypeScript type definitions
 */

// Market Data Types
export interface Candle {
  readonly symbol: string;
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface IndicatorSnapshot {
  readonly timestamp: number;
  readonly close: number;
  readonly emaShort: number;
  readonly emaLong: number;
  readonly rsi: number;
  readonly macd: number;
  readonly macdSignal: number;
  readonly bbUpper: number;
  readonly bbMid: number;
  readonly bbLower: number;
  readonly momentum: number;
}

export type IndicatorResult =
  | { status: 'ready'; snapshot: IndicatorSnapshot }
  | { status: 'insufficient'; required: number; available: number };

// Trading Types
export enum OrderSide {
  BUY = 'BUY',
  SELL = 'SELL'
}

export interface Signal {
  readonly id: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly price: number;
  readonly strength: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly generatedAt: number;
}

export interface Position {
  readonly id: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly openedAt: number;
  readonly signalStrength: number;
  readonly orderId: string;
}

export enum ExitReason {
  STOP_LOSS = 'StopLoss',
  TAKE_PROFIT = 'TakeProfit',
  MAX_TIME = 'MaxTime',
  TECHNICAL_EXIT = 'TechnicalExit',
  SHUTDOWN = 'Shutdown'
}

export type TradeOutcome = 'WIN' | 'LOSS';

export interface TradeRecord {
  readonly positionId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  readonly pnl: number;
  readonly openedAt: number;
  readonly closedAt: number;
  readonly reason: ExitReason;
  readonly signalStrength: number;
}

export interface DailyRiskStats {
  date: string;
  tradeCount: number;
  realizedPnL: number;
  wins: number;
  losses: number;
}

// Collaborator ports
export interface PriceFeed {
  getCurrentPrice(symbol: string): Promise<number | null>;
  getHistoricalCandles?(symbol: string, limit: number): Promise<Candle[]>;
}

export interface AccountProvider {
  getBalance(): Promise<number | null>;
}

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  quantity: number;
}

export type OrderResult =
  | { ok: true; orderId: string }
  | { ok: false; error: string };

export interface OrderExecutor {
  placeOrder(request: OrderRequest): Promise<OrderResult>;
}

export interface Persister {
  saveSignal(signal: Signal): Promise<void>;
  saveTrade(trade: TradeRecord): Promise<void>;
}

export type RiskRejectionReason =
  | 'DAILY_LOSS_LIMIT'
  | 'MAX_OPEN_POSITIONS'
  | 'MIN_TIME_BETWEEN_TRADES'
  | 'POSITION_NOTIONAL_CAP'
  | 'POSITION_RISK_LIMIT'
  | 'INVALID_SIZE';

export type TradingEvent =
  | { type: 'signalGenerated'; signal: Signal }
  | { type: 'tradeOpened'; position: Position }
  | { type: 'tradeClosed'; trade: TradeRecord }
  | { type: 'riskRejected'; signal: Signal; reason: RiskRejectionReason; message: string }
  | { type: 'error'; symbol?: string; operation: string; message: string };

export interface Notifier {
  notify(event: TradingEvent): Promise<void>;
}

// Error Types
export enum TradingErrorCode {
  DATA_INSUFFICIENT = 'DATA_INSUFFICIENT',
  STALE_CANDLE = 'STALE_CANDLE',
  INVALID_CANDLE = 'INVALID_CANDLE',
  EXTERNAL_SERVICE = 'EXTERNAL_SERVICE',
  VALIDATION = 'VALIDATION',
  CONCURRENCY_VIOLATION = 'CONCURRENCY_VIOLATION',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

export class TradingError extends Error {
  constructor(
    public code: TradingErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TradingError';
  }
}

export function isTradingError(error: unknown, code?: TradingErrorCode): error is TradingError {
  return error instanceof TradingError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function oppositeSide(side: OrderSide): OrderSide {
  return side === OrderSide.BUY ? OrderSide.SELL : OrderSide.BUY;
}
