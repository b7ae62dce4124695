import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { buildRiskPolicy, DEFAULT_RISK_POLICY } from "../../src/engine/risk-policy.js";

describe("RiskPolicy", () => {
  it("should carry the standard intraday defaults", () => {
    expect(DEFAULT_RISK_POLICY).toEqual({
      maxRiskPerTradeFraction: 0.03,
      maxTotalPositions: 5,
      maxCePositions: 3,
      maxPePositions: 3,
      maxSpreadPositions: 2,
      defaultStopLossPct: 0.15,
      defaultTargetPct: 0.3,
      trailingStopPct: 0.05,
      maxHoldingHours: 6,
      maxDailyLossFraction: 0.05,
      maxCapitalPerTradeFraction: 0.1,
      biasWarningThreshold: 2,
    });
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(DEFAULT_RISK_POLICY)).toBe(true);
    expect(Object.isFrozen(buildRiskPolicy({ maxTotalPositions: 8 }))).toBe(true);
  });

  it("should apply overrides on top of defaults", () => {
    const policy = buildRiskPolicy({ maxTotalPositions: 8, trailingStopPct: 0.1 });
    expect(policy.maxTotalPositions).toBe(8);
    expect(policy.trailingStopPct).toBe(0.1);
    expect(policy.maxCePositions).toBe(3);
  });

  it("should reject per-side limits above the total", () => {
    expect(() => buildRiskPolicy({ maxCePositions: 6 })).toThrow(ZodError);
  });

  it("should reject fractions outside (0, 1]", () => {
    expect(() => buildRiskPolicy({ maxDailyLossFraction: 0 })).toThrow(ZodError);
    expect(() => buildRiskPolicy({ maxRiskPerTradeFraction: 1.5 })).toThrow(ZodError);
  });
});
