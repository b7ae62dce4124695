import { describe, it, expect } from "vitest";
import { formatLine, parseLogLevel } from "../../src/utils/logger.js";

describe("formatLine", () => {
  it("should tag position entries with module and position id", () => {
    const line = formatLine({
      timestamp: "2025-01-15 10:00:00.000",
      level: "info",
      message: "Opened BUY 1 x NIFTY25000CE @ 50",
      module: "ledger",
      positionId: "POS-000001",
      risk: 500,
    });
    expect(line).toBe(
      '2025-01-15 10:00:00.000 info [ledger POS-000001] Opened BUY 1 x NIFTY25000CE @ 50 {"risk":500}'
    );
  });

  it("should fall back to the engine tag without module or position", () => {
    expect(formatLine({ timestamp: "t", level: "warn", message: "halted" })).toBe("t warn [engine] halted");
  });
});

describe("parseLogLevel", () => {
  it("should accept known levels and default to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("chatty")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
