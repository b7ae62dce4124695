/**
 * Position, exit and rejection type definitions.
 */

import type {
  IntradayStrategy,
  OptionContract,
  OptionSide,
  TradeAction,
} from "./options.js";

export type PositionStatus = "OPEN" | "CLOSED";

export type ExitReason =
  | "STOP_LOSS"
  | "TARGET_HIT"
  | "TIME_BASED"
  | "TRAILING_STOP"
  | "MARKET_CLOSE"
  | "MANUAL";

/** Exchange session slot, in local exchange time */
export type TimeSlot =
  | "PRE_MARKET"  // 9:00 - 9:15
  | "OPENING"     // 9:15 - 9:30
  | "MORNING"     // 9:30 - 11:00
  | "MID_DAY"     // 11:00 - 14:00
  | "AFTERNOON"   // 14:00 - 15:00
  | "CLOSING"     // 15:00 - 15:30
  | "CLOSED";

/** Why a trade was not admitted. No state changes on any of these. */
export type RejectionReason =
  | "POSITION_LIMIT"
  | "SIDE_LIMIT"
  | "SPREAD_LIMIT"
  | "RISK_CAP_EXCEEDED"
  | "DAILY_LOSS_LIMIT_HIT"
  | "INVALID_STOP"
  | "INVALID_TARGET"
  | "INVALID_REQUEST"
  | "MARKET_CLOSED"
  | "INSUFFICIENT_CAPITAL";

export type LookupError = "UNKNOWN_POSITION" | "ALREADY_CLOSED";

export type TickRejection = "INVALID_PRICE" | "INVALID_TIMESTAMP" | "STALE_TICK";

export interface Rejection {
  reason: RejectionReason;
  message: string;
}

/** One option trade, open or closed */
export interface Position {
  id: string;
  contract: OptionContract;
  side: OptionSide;
  action: TradeAction;
  quantity: number;

  entryPrice: number;
  stopLossPrice: number;
  targetPrice: number;

  trailingEnabled: boolean;
  trailingStopPct: number;
  /** null until price first moves favorably past entry */
  trailingStopPrice: number | null;
  /** Best favorable price seen since entry */
  bestPrice: number;

  riskAmount: number;
  openedAt: Date;
  maxHoldingMs: number;

  strategy: IntradayStrategy;
  timeSlot: TimeSlot;
  isSpread: boolean;
  /** Shared by both legs of a straddle/strangle */
  groupId?: string;

  status: PositionStatus;
  exitReason: ExitReason | null;
  exitPrice: number | null;
  closedAt: Date | null;
  realizedPnl: number | null;
}

/** Closed position; frozen once produced */
export type ClosedPosition = Readonly<
  Position & {
    status: "CLOSED";
    exitReason: ExitReason;
    exitPrice: number;
    closedAt: Date;
    realizedPnl: number;
  }
>;

/** Frozen copy of an open position; the ledger keeps the live record */
export type PositionSnapshot = Readonly<Position>;

export type StopUpdateError = LookupError | "INVALID_STOP";

/** Emitted once per closure */
export interface ExitEvent {
  positionId: string;
  symbol: string;
  side: OptionSide;
  exitReason: ExitReason;
  exitPrice: number;
  realizedPnl: number;
  closedAt: Date;
}

/** Pull-based portfolio summary */
export interface PortfolioSummary {
  openPositionCount: number;
  ceCount: number;
  peCount: number;
  spreadCount: number;
  dailyPnl: number;
  unrealizedPnl: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** Percent of closed trades with positive P&L */
  winRate: number;
  averagePnl: number;
  /** Worst single closed-trade P&L (0 when nothing closed) */
  maxDrawdown: number;
  /** CALL count minus PUT count */
  cePeBalance: number;
  directionalBias: boolean;
  tradingHalted: boolean;
}
