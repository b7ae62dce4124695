/**
 * Intraday strategy suggestions keyed by session slot.
 */

import type { IntradayStrategy } from "../types/options.js";
import type { TimeSlot } from "../types/position.js";

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export interface StrategySuggestion {
  strategy: IntradayStrategy;
  description: string;
  riskLevel: RiskLevel;
  strikeSelection: string;
}

const PLAYBOOK: Readonly<Record<TimeSlot, readonly StrategySuggestion[]>> = {
  PRE_MARKET: [],
  OPENING: [
    {
      strategy: "STRADDLE",
      description: "Buy CE and PE at the same strike to trade the opening gap",
      riskLevel: "HIGH",
      strikeSelection: "At-the-money (ATM)",
    },
    {
      strategy: "MOMENTUM_BREAKOUT",
      description: "Breakout of the first 15-minute range",
      riskLevel: "MEDIUM",
      strikeSelection: "Near-the-money",
    },
  ],
  MORNING: [
    {
      strategy: "TECHNICAL_BREAKOUT",
      description: "Breakouts from support/resistance",
      riskLevel: "MEDIUM",
      strikeSelection: "Support/resistance levels",
    },
    {
      strategy: "STRANGLE",
      description: "Buy OTM CE and PE for volatility expansion",
      riskLevel: "MEDIUM",
      strikeSelection: "Out-of-the-money (OTM)",
    },
  ],
  MID_DAY: [
    {
      strategy: "MEAN_REVERSION",
      description: "Fade extended moves back to the mean",
      riskLevel: "LOW",
      strikeSelection: "Moving average levels",
    },
    {
      strategy: "VOLATILITY_EXPANSION",
      description: "Position for a volatility pickup",
      riskLevel: "MEDIUM",
      strikeSelection: "Volatility bands",
    },
  ],
  AFTERNOON: [],
  CLOSING: [
    {
      strategy: "MEAN_REVERSION",
      description: "End-of-day mean reversion",
      riskLevel: "LOW",
      strikeSelection: "Daily pivot points",
    },
  ],
  CLOSED: [],
};

export function recommendStrategies(slot: TimeSlot): StrategySuggestion[] {
  return [...PLAYBOOK[slot]];
}
