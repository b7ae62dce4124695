/**
 * Shared fixtures for engine tests.
 */

import { createPosition, type NewPositionParams } from "../src/engine/position.js";
import { makeContract, type OptionSide } from "../src/types/options.js";
import type { Position } from "../src/types/position.js";

export const EXPIRY = new Date("2025-01-16T15:30:00+05:30");

/** Instant at the given IST wall-clock time */
export function ist(time: string, date: string = "2025-01-15"): Date {
  const hhmmss = time.length === 5 ? `${time}:00` : time;
  return new Date(`${date}T${hhmmss}+05:30`);
}

export function niftyContract(side: OptionSide, strike: number = 25000) {
  return makeContract("NIFTY", strike, side, EXPIRY, 50);
}

let seq = 0;

export function buildPosition(overrides: Partial<NewPositionParams> = {}): Position {
  seq += 1;
  return createPosition({
    id: `T-${seq}`,
    contract: niftyContract("CALL"),
    action: "BUY",
    quantity: 1,
    entryPrice: 50,
    stopLossPrice: 40,
    targetPrice: 65,
    trailingEnabled: true,
    trailingStopPct: 0.05,
    openedAt: ist("10:00"),
    maxHoldingHours: 6,
    strategy: "MANUAL",
    timeSlot: "MORNING",
    isSpread: false,
    ...overrides,
  });
}
