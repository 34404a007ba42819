import { DailyRiskStats, RiskRejectionReason, TradeOutcome } from '@tickwise/types';

export type RiskDecision =
  | {
      accepted: true;
      quantity: number;
      stopLoss: number;
      takeProfit: number;
    }
  | {
      accepted: false;
      reason: RiskRejectionReason;
      message: string;
    };

export interface TradeHistoryEntry {
  timestamp: number;
  pnl: number;
  outcome: TradeOutcome;
}

export interface TradingStats {
  daily: DailyRiskStats;
  /** Percent of today's trades that were wins */
  winRate: number;
  totalTrades: number;
  totalPnL: number;
}

export interface HistoryStats {
  winRate: number;
  avgWin: number;
  avgLoss: number;
  totalTrades: number;
  totalPnL: number;
}

export interface SymbolRateStatus {
  lastSignalTime: number | null;
  lastOrderTime: number | null;
  canCheckSignal: boolean;
  canPlaceOrder: boolean;
  nextSignalTime: number;
  nextOrderTime: number;
}

export interface TradingStatus {
  isTradingTime: boolean;
  date: string;
  dailyOrders: number;
  pendingOrders: number;
  maxDailyOrders: number;
  remainingOrders: number;
  symbols: Record<string, SymbolRateStatus>;
}
