/**
 * Position record helpers: direction maths, P&L and the close transition.
 */

import type { IntradayStrategy, OptionContract, TradeAction } from "../types/options.js";
import type {
  ClosedPosition,
  ExitReason,
  Position,
  PositionSnapshot,
  TimeSlot,
} from "../types/position.js";

const HOUR_MS = 3_600_000;

/** +1 for BUY, -1 for SELL */
export function directionSign(action: TradeAction): 1 | -1 {
  return action === "BUY" ? 1 : -1;
}

/** True when `price` is better for the position than `reference` */
export function isFavorable(action: TradeAction, price: number, reference: number): boolean {
  return action === "BUY" ? price > reference : price < reference;
}

/** Positive and strictly on the losing side of `reference` */
export function isLossSide(action: TradeAction, stop: number, reference: number): boolean {
  return stop > 0 && (action === "BUY" ? stop < reference : stop > reference);
}

/** BUY: stop < entry < target. SELL: target < entry < stop. */
export function hasValidThresholds(
  action: TradeAction,
  entryPrice: number,
  stopLossPrice: number,
  targetPrice: number
): boolean {
  return action === "BUY"
    ? stopLossPrice < entryPrice && entryPrice < targetPrice
    : targetPrice < entryPrice && entryPrice < stopLossPrice;
}

/** |entry - stop| x quantity x lot size */
export function computeRiskAmount(
  entryPrice: number,
  stopLossPrice: number,
  quantity: number,
  lotSize: number
): number {
  return Math.abs(entryPrice - stopLossPrice) * quantity * lotSize;
}

/** (exit - entry) x sign x quantity x lot size */
export function computePnl(
  position: Pick<Position, "action" | "entryPrice" | "quantity" | "contract">,
  exitPrice: number
): number {
  return (
    (exitPrice - position.entryPrice) *
    directionSign(position.action) *
    position.quantity *
    position.contract.lotSize
  );
}

export interface NewPositionParams {
  id: string;
  contract: OptionContract;
  action: TradeAction;
  quantity: number;
  entryPrice: number;
  stopLossPrice: number;
  targetPrice: number;
  trailingEnabled: boolean;
  trailingStopPct: number;
  openedAt: Date;
  maxHoldingHours: number;
  strategy: IntradayStrategy;
  timeSlot: TimeSlot;
  isSpread: boolean;
  groupId?: string;
}

export function createPosition(params: NewPositionParams): Position {
  return {
    id: params.id,
    contract: Object.freeze({ ...params.contract }),
    side: params.contract.side,
    action: params.action,
    quantity: params.quantity,
    entryPrice: params.entryPrice,
    stopLossPrice: params.stopLossPrice,
    targetPrice: params.targetPrice,
    trailingEnabled: params.trailingEnabled,
    trailingStopPct: params.trailingStopPct,
    trailingStopPrice: null,
    bestPrice: params.entryPrice,
    riskAmount: computeRiskAmount(
      params.entryPrice,
      params.stopLossPrice,
      params.quantity,
      params.contract.lotSize
    ),
    openedAt: params.openedAt,
    maxHoldingMs: params.maxHoldingHours * HOUR_MS,
    strategy: params.strategy,
    timeSlot: params.timeSlot,
    isSpread: params.isSpread,
    groupId: params.groupId,
    status: "OPEN",
    exitReason: null,
    exitPrice: null,
    closedAt: null,
    realizedPnl: null,
  };
}

export function snapshotPosition(position: Position): PositionSnapshot {
  return Object.freeze({ ...position });
}

/**
 * OPEN -> CLOSED. Returns a frozen copy; the caller replaces its reference.
 */
export function closePositionRecord(
  position: Position,
  exitPrice: number,
  exitReason: ExitReason,
  closedAt: Date
): ClosedPosition {
  return Object.freeze({
    ...position,
    status: "CLOSED" as const,
    exitReason,
    exitPrice,
    closedAt,
    realizedPnl: computePnl(position, exitPrice),
  });
}
