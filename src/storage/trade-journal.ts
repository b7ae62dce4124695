/**
 * Trade Journal & Performance Tracker
 *
 * Persistence sink for the lifecycle engine:
 *   - one record per position, written at entry and completed at exit
 *   - win/loss tracking by strategy
 *   - JSON file storage with atomic writes (tmp + rename)
 *
 * The engine only depends on the `TradeJournal` interface; a failed write is
 * logged and never interrupts monitoring.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import type { ClosedPosition, ExitReason, Position } from "../types/position.js";
import { moduleLogger } from "../utils/logger.js";

const log = moduleLogger("trade-journal");

// ─── Interfaces ─────────────────────────────────────────

export interface TradeJournal {
  recordEntry(position: Readonly<Position>): void;
  recordExit(position: ClosedPosition): void;
}

export const TradeRecordSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side: z.enum(["CALL", "PUT"]),
  action: z.enum(["BUY", "SELL"]),
  strategy: z.string(),
  timeSlot: z.string(),
  groupId: z.string().optional(),
  quantity: z.number(),
  lotSize: z.number(),
  entryPrice: z.number(),
  stopLossPrice: z.number(),
  targetPrice: z.number(),
  riskAmount: z.number(),
  entryTime: z.string(),
  exitTime: z.string().optional(),
  exitPrice: z.number().optional(),
  exitReason: z
    .enum(["STOP_LOSS", "TARGET_HIT", "TIME_BASED", "TRAILING_STOP", "MARKET_CLOSE", "MANUAL"])
    .optional(),
  realizedPnl: z.number().optional(),
  /** Hours between entry and exit */
  holdingHours: z.number().optional(),
  outcome: z.enum(["win", "loss", "breakeven", "open"]),
});

export type TradeRecord = z.infer<typeof TradeRecordSchema>;

const JournalDataSchema = z.object({
  version: z.literal(1),
  trades: z.array(TradeRecordSchema),
});

type JournalData = z.infer<typeof JournalDataSchema>;

export interface StrategyPerformance {
  strategy: string;
  totalTrades: number;
  wins: number;
  losses: number;
  breakevens: number;
  /** Percent, one decimal */
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  bestTrade: number;
  worstTrade: number;
}

export interface JournalSummary {
  totalTrades: number;
  openTrades: number;
  closedTrades: number;
  overallWinRate: number;
  totalPnl: number;
  exitsByReason: Partial<Record<ExitReason, number>>;
  byStrategy: StrategyPerformance[];
}

// ─── Record helpers ─────────────────────────────────────

function toEntryRecord(position: Readonly<Position>): TradeRecord {
  return {
    id: position.id,
    symbol: position.contract.symbol,
    side: position.side,
    action: position.action,
    strategy: position.strategy,
    timeSlot: position.timeSlot,
    groupId: position.groupId,
    quantity: position.quantity,
    lotSize: position.contract.lotSize,
    entryPrice: position.entryPrice,
    stopLossPrice: position.stopLossPrice,
    targetPrice: position.targetPrice,
    riskAmount: position.riskAmount,
    entryTime: position.openedAt.toISOString(),
    outcome: "open",
  };
}

function outcomeOf(pnl: number): TradeRecord["outcome"] {
  if (pnl > 0) return "win";
  if (pnl < 0) return "loss";
  return "breakeven";
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

// ─── In-memory journal ──────────────────────────────────

export class MemoryTradeJournal implements TradeJournal {
  protected data: JournalData = { version: 1, trades: [] };

  recordEntry(position: Readonly<Position>): void {
    const record = toEntryRecord(position);
    const index = this.data.trades.findIndex((t) => t.id === record.id);
    if (index >= 0) this.data.trades[index] = record;
    else this.data.trades.push(record);
    this.persist();
  }

  recordExit(position: ClosedPosition): void {
    let record = this.data.trades.find((t) => t.id === position.id);
    if (!record) {
      log.warn(`Exit for unjournaled trade ${position.id}; recording entry now`);
      record = toEntryRecord(position);
      this.data.trades.push(record);
    }

    record.exitTime = position.closedAt.toISOString();
    record.exitPrice = position.exitPrice;
    record.exitReason = position.exitReason;
    record.realizedPnl = position.realizedPnl;
    record.holdingHours = (position.closedAt.getTime() - position.openedAt.getTime()) / 3_600_000;
    record.outcome = outcomeOf(position.realizedPnl);
    this.persist();
  }

  /** Hook for storage-backed subclasses */
  protected persist(): void {}

  trades(): TradeRecord[] {
    return this.data.trades.map((t) => ({ ...t }));
  }

  getOpenTrades(): TradeRecord[] {
    return this.trades().filter((t) => t.outcome === "open");
  }

  getStrategyPerformance(strategy?: string): StrategyPerformance[] {
    const closed = this.data.trades.filter(
      (t) => t.outcome !== "open" && (!strategy || t.strategy === strategy)
    );

    const byStrategy = new Map<string, TradeRecord[]>();
    for (const trade of closed) {
      const bucket = byStrategy.get(trade.strategy) ?? [];
      bucket.push(trade);
      byStrategy.set(trade.strategy, bucket);
    }

    const results: StrategyPerformance[] = [];
    for (const [name, trades] of byStrategy) {
      const pnls = trades.map((t) => t.realizedPnl ?? 0);
      const wins = trades.filter((t) => t.outcome === "win").length;
      const losses = trades.filter((t) => t.outcome === "loss").length;
      const totalPnl = pnls.reduce((sum, p) => sum + p, 0);

      results.push({
        strategy: name,
        totalTrades: trades.length,
        wins,
        losses,
        breakevens: trades.length - wins - losses,
        winRate: Math.round((wins / trades.length) * 1000) / 10,
        totalPnl: round2(totalPnl),
        avgPnl: round2(totalPnl / trades.length),
        bestTrade: Math.max(...pnls),
        worstTrade: Math.min(...pnls),
      });
    }

    return results.sort((a, b) => b.winRate - a.winRate);
  }

  summary(): JournalSummary {
    const closed = this.data.trades.filter((t) => t.outcome !== "open");
    const wins = closed.filter((t) => t.outcome === "win").length;
    const exitsByReason: Partial<Record<ExitReason, number>> = {};
    for (const trade of closed) {
      if (trade.exitReason) {
        exitsByReason[trade.exitReason] = (exitsByReason[trade.exitReason] ?? 0) + 1;
      }
    }

    return {
      totalTrades: this.data.trades.length,
      openTrades: this.data.trades.length - closed.length,
      closedTrades: closed.length,
      overallWinRate: closed.length > 0 ? Math.round((wins / closed.length) * 1000) / 10 : 0,
      totalPnl: round2(closed.reduce((sum, t) => sum + (t.realizedPnl ?? 0), 0)),
      exitsByReason,
      byStrategy: this.getStrategyPerformance(),
    };
  }
}

// ─── JSON file journal ──────────────────────────────────

export class JsonFileTradeJournal extends MemoryTradeJournal {
  constructor(private readonly filePath: string) {
    super();
    this.load();
  }

  private load(): void {
    try {
      if (!fs.existsSync(this.filePath)) return;
      const raw = fs.readFileSync(this.filePath, "utf-8");
      const parsed = JournalDataSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        this.data = parsed.data;
        log.info(`Trade journal loaded: ${this.data.trades.length} records`);
      } else {
        log.warn(`Trade journal at ${this.filePath} is invalid; starting empty`);
      }
    } catch (error) {
      log.warn(`Failed to load trade journal: ${String(error)}`);
    }
  }

  protected override persist(): void {
    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

      const tmpFile = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpFile, JSON.stringify(this.data, null, 2), "utf-8");
      fs.renameSync(tmpFile, this.filePath);
    } catch (error) {
      log.error(`Failed to save trade journal: ${String(error)}`);
    }
  }
}
