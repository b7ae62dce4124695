/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";
import { buildRiskPolicy, type RiskPolicy } from "../engine/risk-policy.js";

dotenv.config();

const ConfigSchema = z.object({
  // Account
  accountBalance: z.coerce.number().positive().default(100_000),
  exchangeUtcOffsetMinutes: z.coerce.number().int().default(330),

  // Risk Parameters (unset values fall through to policy defaults)
  risk: z.object({
    maxRiskPerTradeFraction: z.coerce.number().optional(),
    maxTotalPositions: z.coerce.number().optional(),
    maxCePositions: z.coerce.number().optional(),
    maxPePositions: z.coerce.number().optional(),
    maxSpreadPositions: z.coerce.number().optional(),
    defaultStopLossPct: z.coerce.number().optional(),
    defaultTargetPct: z.coerce.number().optional(),
    trailingStopPct: z.coerce.number().optional(),
    maxHoldingHours: z.coerce.number().optional(),
    maxDailyLossFraction: z.coerce.number().optional(),
  }),

  // Storage
  journalPath: z.string().default("data/trade-journal.json"),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  port: z.coerce.number().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Blank values (`MAX_CE_POSITIONS=`) count as unset so defaults apply */
function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const read = (key: string) => readEnv(env, key);
  const raw = {
    accountBalance: read("ACCOUNT_BALANCE"),
    exchangeUtcOffsetMinutes: read("EXCHANGE_UTC_OFFSET_MINUTES"),
    risk: {
      maxRiskPerTradeFraction: read("MAX_RISK_PER_TRADE_FRACTION"),
      maxTotalPositions: read("MAX_TOTAL_POSITIONS"),
      maxCePositions: read("MAX_CE_POSITIONS"),
      maxPePositions: read("MAX_PE_POSITIONS"),
      maxSpreadPositions: read("MAX_SPREAD_POSITIONS"),
      defaultStopLossPct: read("DEFAULT_STOP_LOSS_PCT"),
      defaultTargetPct: read("DEFAULT_TARGET_PCT"),
      trailingStopPct: read("TRAILING_STOP_PCT"),
      maxHoldingHours: read("MAX_HOLDING_HOURS"),
      maxDailyLossFraction: read("MAX_DAILY_LOSS_FRACTION"),
    },
    journalPath: read("JOURNAL_PATH"),
    logLevel: read("LOG_LEVEL"),
    port: read("PORT"),
  };

  return ConfigSchema.parse(raw);
}

/** Risk policy from config; throws ZodError on invalid limits */
export function riskPolicyFromConfig(cfg: Config): RiskPolicy {
  return buildRiskPolicy(cfg.risk);
}

/** Singleton config instance */
export const config = loadConfig();
