/**
 * Exit Rules Engine
 *
 * Decides whether an open position must be closed on this tick. Triggers are
 * checked in strict priority order and the first match wins:
 *   1. MARKET_CLOSE  at or past 15:30, regardless of price
 *   2. TIME_BASED    held for maxHoldingMs or longer
 *   3. STOP_LOSS
 *   4. TARGET_HIT
 *   5. TRAILING_STOP only once a trailing price exists
 *
 * The trailing-stop ratchet runs on every tick before the decision, whether or
 * not an exit fires.
 */

import type { ExitReason, Position } from "../types/position.js";
import { isFavorable } from "./position.js";
import type { SessionClock } from "./session-clock.js";

/** Automatic exit reasons, highest priority first. MANUAL is never automatic. */
export type AutomaticExitReason = Exclude<ExitReason, "MANUAL">;

export const EXIT_PRIORITY: readonly AutomaticExitReason[] = [
  "MARKET_CLOSE",
  "TIME_BASED",
  "STOP_LOSS",
  "TARGET_HIT",
  "TRAILING_STOP",
];

type ExitInputs = Pick<
  Position,
  | "action"
  | "stopLossPrice"
  | "targetPrice"
  | "trailingEnabled"
  | "trailingStopPrice"
  | "openedAt"
  | "maxHoldingMs"
>;

/**
 * Advance the trailing stop when price improves on the best seen so far.
 * BUY trails at price x (1 - pct), SELL at price x (1 + pct); the stored
 * value only ever moves in the position's favor.
 *
 * @returns true when the trailing price changed
 */
export function updateTrailingStop(position: Position, currentPrice: number): boolean {
  if (!position.trailingEnabled) return false;
  if (!isFavorable(position.action, currentPrice, position.bestPrice)) return false;

  position.bestPrice = currentPrice;

  const candidate =
    position.action === "BUY"
      ? currentPrice * (1 - position.trailingStopPct)
      : currentPrice * (1 + position.trailingStopPct);

  const previous = position.trailingStopPrice;
  const next =
    previous === null
      ? candidate
      : position.action === "BUY"
        ? Math.max(previous, candidate)
        : Math.min(previous, candidate);

  position.trailingStopPrice = next;
  return next !== previous;
}

function triggerFires(
  reason: AutomaticExitReason,
  position: ExitInputs,
  price: number,
  now: Date,
  clock: SessionClock
): boolean {
  const isBuy = position.action === "BUY";

  switch (reason) {
    case "MARKET_CLOSE":
      return clock.isAtOrPastClose(now, position.openedAt);
    case "TIME_BASED":
      return now.getTime() - position.openedAt.getTime() >= position.maxHoldingMs;
    case "STOP_LOSS":
      return isBuy ? price <= position.stopLossPrice : price >= position.stopLossPrice;
    case "TARGET_HIT":
      return isBuy ? price >= position.targetPrice : price <= position.targetPrice;
    case "TRAILING_STOP": {
      const trail = position.trailingStopPrice;
      if (!position.trailingEnabled || trail === null) return false;
      return isBuy ? price <= trail : price >= trail;
    }
    default: {
      const unreachable: never = reason;
      return unreachable;
    }
  }
}

/** Pure decision: at most one reason, by priority */
export function decideExit(
  position: ExitInputs,
  currentPrice: number,
  now: Date,
  clock: SessionClock
): AutomaticExitReason | null {
  for (const reason of EXIT_PRIORITY) {
    if (triggerFires(reason, position, currentPrice, now, clock)) return reason;
  }
  return null;
}

/** Ratchet the trailing stop, then decide */
export function evaluateExit(
  position: Position,
  currentPrice: number,
  now: Date,
  clock: SessionClock
): AutomaticExitReason | null {
  updateTrailingStop(position, currentPrice);
  return decideExit(position, currentPrice, now, clock);
}
