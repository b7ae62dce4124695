/**
 * Input validation schemas.
 */

import { z } from "zod";
import type { IntradayStrategy } from "../types/options.js";

const STRATEGIES = [
  "MOMENTUM_BREAKOUT",
  "MEAN_REVERSION",
  "GAP_TRADING",
  "NEWS_BASED",
  "TECHNICAL_BREAKOUT",
  "VOLATILITY_EXPANSION",
  "STRADDLE",
  "STRANGLE",
  "MANUAL",
] as const satisfies readonly IntradayStrategy[];

export const ContractSchema = z.object({
  symbol: z.string().min(1),
  underlying: z.string().min(1),
  side: z.enum(["CALL", "PUT"]),
  strike: z.number().positive(),
  expiry: z.coerce.date(),
  lotSize: z.number().int().positive().default(50),
});

/** Absolute price, or a fraction of entry (0.15 = 15%) */
export const PriceLevelSchema = z.union([
  z.object({ price: z.number().positive() }).strict(),
  z.object({ pct: z.number().positive() }).strict(),
]);

export const TradeRequestSchema = z.object({
  contract: ContractSchema,
  action: z.enum(["BUY", "SELL"]),
  entryPrice: z.number().positive(),
  stopLoss: PriceLevelSchema.optional(),
  target: PriceLevelSchema.optional(),
  quantity: z.number().int().positive().optional(),
  /** Risk budget used for sizing when quantity is absent */
  riskAmount: z.number().positive().optional(),
  maxHoldingHours: z.number().positive().optional(),
  trailingEnabled: z.boolean().default(true),
  isSpread: z.boolean().default(false),
  strategy: z.enum(STRATEGIES).default("MANUAL"),
  openedAt: z.coerce.date(),
});

export type PriceLevel = z.infer<typeof PriceLevelSchema>;
export type TradeRequestInput = z.input<typeof TradeRequestSchema>;
export type TradeRequest = z.infer<typeof TradeRequestSchema>;

/** Two-leg CE + PE entry (straddle when strikes match, strangle otherwise) */
export const PairRequestSchema = z.object({
  underlying: z.string().min(1).default("NIFTY"),
  ceStrike: z.number().positive(),
  peStrike: z.number().positive(),
  expiry: z.coerce.date(),
  lotSize: z.number().int().positive().default(50),
  ceEntryPrice: z.number().positive(),
  peEntryPrice: z.number().positive(),
  stopLossPct: z.number().positive().optional(),
  targetPct: z.number().positive().optional(),
  quantity: z.number().int().positive().default(1),
  openedAt: z.coerce.date(),
});

export type PairRequestInput = z.input<typeof PairRequestSchema>;

export const PriceTickSchema = z.object({
  timestamp: z.coerce.date(),
  price: z.number(),
});

export type PriceTick = z.infer<typeof PriceTickSchema>;

export const StopLossUpdateSchema = z.object({
  price: z.number().positive(),
  referencePrice: z.number().positive().optional(),
});

export const ClosePositionSchema = z.object({
  price: z.number().positive(),
  timestamp: z.coerce.date().optional(),
});
