/**
 * Session Clock
 *
 * Maps an instant to the exchange's intraday time slot. Exchange local time is
 * the UTC instant shifted by a fixed offset (IST, +5:30, has no DST).
 */

import type { TimeSlot } from "../types/position.js";

/** Default offset for NSE (IST) */
export const IST_OFFSET_MINUTES = 330;

const MINUTE_MS = 60_000;

/** Minutes since local midnight */
const hm = (h: number, m: number): number => h * 60 + m;

export const PRE_MARKET_START = hm(9, 0);
export const MARKET_OPEN = hm(9, 15);
export const MARKET_CLOSE = hm(15, 30);

/** Slot start boundaries, ascending. A slot runs until the next start. */
const SLOT_BOUNDARIES: ReadonlyArray<{ start: number; slot: TimeSlot }> = [
  { start: PRE_MARKET_START, slot: "PRE_MARKET" },
  { start: MARKET_OPEN, slot: "OPENING" },
  { start: hm(9, 30), slot: "MORNING" },
  { start: hm(11, 0), slot: "MID_DAY" },
  { start: hm(14, 0), slot: "AFTERNOON" },
  { start: hm(15, 0), slot: "CLOSING" },
  { start: MARKET_CLOSE, slot: "CLOSED" },
];

const OPEN_SLOTS: ReadonlySet<TimeSlot> = new Set<TimeSlot>([
  "OPENING",
  "MORNING",
  "MID_DAY",
  "AFTERNOON",
  "CLOSING",
]);

export class SessionClock {
  constructor(readonly utcOffsetMinutes: number = IST_OFFSET_MINUTES) {}

  /** Local exchange time as a Date whose UTC fields read as local fields */
  private toLocal(ts: Date): Date {
    return new Date(ts.getTime() + this.utcOffsetMinutes * MINUTE_MS);
  }

  /** Minutes since local midnight, or null for an invalid Date */
  minuteOfDay(ts: Date): number | null {
    if (Number.isNaN(ts.getTime())) return null;
    const local = this.toLocal(ts);
    return local.getUTCHours() * 60 + local.getUTCMinutes();
  }

  /** Local trading date as YYYY-MM-DD, or null for an invalid Date */
  tradingDate(ts: Date): string | null {
    if (Number.isNaN(ts.getTime())) return null;
    return this.toLocal(ts).toISOString().slice(0, 10);
  }

  timeSlot(ts: Date): TimeSlot {
    const minute = this.minuteOfDay(ts);
    if (minute === null || minute < PRE_MARKET_START) return "CLOSED";

    let current: TimeSlot = "CLOSED";
    for (const { start, slot } of SLOT_BOUNDARIES) {
      if (minute >= start) current = slot;
    }
    return current;
  }

  isMarketOpen(ts: Date): boolean {
    return OPEN_SLOTS.has(this.timeSlot(ts));
  }

  /**
   * True at or after 15:30 local, or on any later trading date than
   * `openedAt` (a position carried past midnight is past its session close).
   */
  isAtOrPastClose(ts: Date, openedAt?: Date): boolean {
    const minute = this.minuteOfDay(ts);
    if (minute === null) return false;
    if (minute >= MARKET_CLOSE) return true;
    if (!openedAt) return false;
    const openedOn = this.tradingDate(openedAt);
    const today = this.tradingDate(ts);
    return openedOn !== null && today !== null && today > openedOn;
  }
}
