import { describe, it, expect } from "vitest";
import { sizePosition } from "../../src/engine/position-sizing.js";

const base = {
  lotSize: 50,
  accountBalance: 100_000,
  maxCapitalPerTradeFraction: 0.1,
};

describe("sizePosition", () => {
  it("should size lots from the risk budget", () => {
    const result = sizePosition({ ...base, entryPrice: 20, stopLossPrice: 10, riskBudget: 3000 });
    expect(result).toEqual({ quantity: 6, riskPerLot: 500, maxLotsByCapital: 10 });
  });

  it("should take at least one lot when the budget is smaller than one lot's risk", () => {
    const result = sizePosition({ ...base, entryPrice: 20, stopLossPrice: 10, riskBudget: 100 });
    expect(result.quantity).toBe(1);
  });

  it("should cap lots by capital outlay", () => {
    const result = sizePosition({ ...base, entryPrice: 100, stopLossPrice: 90, riskBudget: 3000 });
    expect(result.quantity).toBe(2);
    expect(result.maxLotsByCapital).toBe(2);
  });

  it("should return zero when not even one lot fits the capital cap", () => {
    const result = sizePosition({ ...base, entryPrice: 250, stopLossPrice: 200, riskBudget: 3000 });
    expect(result.quantity).toBe(0);
  });

  it("should return zero for a stop at entry", () => {
    const result = sizePosition({ ...base, entryPrice: 50, stopLossPrice: 50, riskBudget: 3000 });
    expect(result.quantity).toBe(0);
    expect(result.riskPerLot).toBe(0);
  });
});
