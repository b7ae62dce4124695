/**
 * Risk Policy
 *
 * Immutable per-session limits. Built once and passed into the engine;
 * per-trade overrides travel on the trade request instead of mutating this.
 */

import { z } from "zod";

const fraction = z.number().gt(0).max(1);
const count = z.number().int().positive();

export const RiskPolicySchema = z.object({
  /** Max capital at risk per trade, as a fraction of account balance */
  maxRiskPerTradeFraction: fraction.default(0.03),
  maxTotalPositions: count.default(5),
  maxCePositions: count.default(3),
  maxPePositions: count.default(3),
  maxSpreadPositions: count.default(2),
  defaultStopLossPct: fraction.default(0.15),
  defaultTargetPct: z.number().gt(0).default(0.3),
  trailingStopPct: fraction.default(0.05),
  maxHoldingHours: z.number().positive().default(6),
  /** Realized loss, as a fraction of balance, that halts new entries */
  maxDailyLossFraction: fraction.default(0.05),
  /** Cap on premium outlay per trade when sizing from a risk budget */
  maxCapitalPerTradeFraction: fraction.default(0.1),
  /** |CALL - PUT| above this flags directional bias (advisory) */
  biasWarningThreshold: z.number().int().nonnegative().default(2),
});

export type RiskPolicy = Readonly<z.infer<typeof RiskPolicySchema>>;

export const DEFAULT_RISK_POLICY: RiskPolicy = Object.freeze(RiskPolicySchema.parse({}));

/**
 * Build a validated, frozen policy. Throws ZodError on invalid limits, which
 * is a startup-time configuration error.
 */
export function buildRiskPolicy(overrides?: Partial<RiskPolicy>): RiskPolicy {
  const policy = RiskPolicySchema.parse({ ...DEFAULT_RISK_POLICY, ...overrides });
  if (policy.maxCePositions > policy.maxTotalPositions || policy.maxPePositions > policy.maxTotalPositions) {
    throw new z.ZodError([
      {
        code: z.ZodIssueCode.custom,
        path: ["maxTotalPositions"],
        message: "Per-side limits cannot exceed maxTotalPositions",
      },
    ]);
  }
  return Object.freeze(policy);
}
