/**
 * Position record tests: risk, P&L and the close transition.
 */

import { describe, it, expect } from "vitest";
import {
  closePositionRecord,
  computePnl,
  computeRiskAmount,
  hasValidThresholds,
} from "../../src/engine/position.js";
import { buildPosition, ist, niftyContract } from "../helpers.js";

describe("computeRiskAmount", () => {
  it("should multiply the stop distance by quantity and lot size", () => {
    expect(computeRiskAmount(50, 40, 1, 50)).toBe(500);
    expect(computeRiskAmount(50, 60, 2, 25)).toBe(500);
  });
});

describe("computePnl", () => {
  it("should be negative for a BUY stopped below entry", () => {
    const position = buildPosition({ entryPrice: 50, quantity: 1 });
    expect(computePnl(position, 39)).toBe(-550);
  });

  it("should invert the sign for SELL", () => {
    const position = buildPosition({
      action: "SELL",
      entryPrice: 50,
      stopLossPrice: 60,
      targetPrice: 35,
      quantity: 2,
      contract: niftyContract("PUT"),
    });
    expect(computePnl(position, 39)).toBe(1100);
  });
});

describe("hasValidThresholds", () => {
  it("should require stop < entry < target for BUY", () => {
    expect(hasValidThresholds("BUY", 50, 40, 65)).toBe(true);
    expect(hasValidThresholds("BUY", 50, 55, 65)).toBe(false);
    expect(hasValidThresholds("BUY", 50, 40, 45)).toBe(false);
  });

  it("should require target < entry < stop for SELL", () => {
    expect(hasValidThresholds("SELL", 50, 60, 35)).toBe(true);
    expect(hasValidThresholds("SELL", 50, 40, 35)).toBe(false);
  });
});

describe("createPosition", () => {
  it("should start OPEN with no trailing stop and best price at entry", () => {
    const position = buildPosition({ maxHoldingHours: 2 });
    expect(position.status).toBe("OPEN");
    expect(position.trailingStopPrice).toBeNull();
    expect(position.bestPrice).toBe(50);
    expect(position.riskAmount).toBe(500);
    expect(position.maxHoldingMs).toBe(7_200_000);
    expect(position.side).toBe("CALL");
  });
});

describe("closePositionRecord", () => {
  it("should return a frozen closed copy and leave the original untouched", () => {
    const position = buildPosition();
    const closed = closePositionRecord(position, 39, "STOP_LOSS", ist("10:05"));

    expect(Object.isFrozen(closed)).toBe(true);
    expect(closed.status).toBe("CLOSED");
    expect(closed.exitReason).toBe("STOP_LOSS");
    expect(closed.exitPrice).toBe(39);
    expect(closed.realizedPnl).toBe(-550);
    expect(position.status).toBe("OPEN");
  });
});
