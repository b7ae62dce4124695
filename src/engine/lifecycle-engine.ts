/**
 * Lifecycle Engine
 *
 * Drives every position through PENDING -> OPEN -> CLOSED:
 *   1. Validates a trade request and resolves stop/target/quantity
 *   2. Admits it through the ledger in one validate-and-admit step
 *   3. On each price tick, evaluates every open position and closes the ones
 *      whose exit rule fires
 *   4. Sweeps everything at session end
 *
 * All calls are synchronous and return typed results; a bad tick or request
 * is rejected on its own and never stops monitoring of other positions.
 */

import { EventEmitter } from "eventemitter3";
import type { OptionContract, TradeAction } from "../types/options.js";
import { makeContract } from "../types/options.js";
import type {
  ClosedPosition,
  ExitEvent,
  ExitReason,
  LookupError,
  PortfolioSummary,
  Position,
  PositionSnapshot,
  Rejection,
  StopUpdateError,
  TickRejection,
  TimeSlot,
} from "../types/position.js";
import { err, ok, type Result } from "../types/result.js";
import {
  PairRequestSchema,
  TradeRequestSchema,
  type PairRequestInput,
  type PriceLevel,
  type PriceTick,
  type TradeRequest,
  type TradeRequestInput,
} from "../utils/validation.js";
import type { TradeJournal } from "../storage/trade-journal.js";
import { moduleLogger } from "../utils/logger.js";
import { decideExit } from "./exit-evaluator.js";
import { PortfolioLedger } from "./portfolio-ledger.js";
import { createPosition, hasValidThresholds, isLossSide } from "./position.js";
import { sizePosition } from "./position-sizing.js";
import type { RiskPolicy } from "./risk-policy.js";
import { SessionClock } from "./session-clock.js";
import { recommendStrategies, type StrategySuggestion } from "./strategy-playbook.js";

const log = moduleLogger("lifecycle");

interface EngineEvents {
  opened: (position: PositionSnapshot) => void;
  rejected: (rejection: Rejection) => void;
  exit: (event: ExitEvent) => void;
  tick_rejected: (reason: TickRejection, tick: PriceTick) => void;
  bias_warning: (skew: number) => void;
}

export interface LifecycleEngineOptions {
  policy: RiskPolicy;
  accountBalance: number;
  clock?: SessionClock;
  journal?: TradeJournal;
}

export interface PositionPair {
  groupId: string;
  ce: PositionSnapshot;
  pe: PositionSnapshot;
  totalRisk: number;
}

export interface EngineSummary extends PortfolioSummary {
  timeSlot: TimeSlot;
  marketOpen: boolean;
}

export interface ReplayResult {
  exits: ExitEvent[];
  rejectedTicks: Array<{ tick: PriceTick; reason: TickRejection }>;
}

export type ManualCloseError = LookupError | TickRejection;

export class LifecycleEngine extends EventEmitter<EngineEvents> {
  readonly ledger: PortfolioLedger;
  readonly clock: SessionClock;
  private readonly policy: RiskPolicy;
  private readonly journal?: TradeJournal;
  private positionSeq = 0;
  private groupSeq = 0;
  private lastTickAt: Date | null = null;

  constructor(options: LifecycleEngineOptions) {
    super();
    this.policy = options.policy;
    this.clock = options.clock ?? new SessionClock();
    this.journal = options.journal;
    this.ledger = new PortfolioLedger(options.policy, options.accountBalance);
  }

  // ─── Entry ─────────────────────────────────────────────

  placeTrade(input: TradeRequestInput): Result<PositionSnapshot, Rejection> {
    const parsed = TradeRequestSchema.safeParse(input);
    if (!parsed.success) {
      return this.reject({
        reason: "INVALID_REQUEST",
        message: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
    }

    const prepared = this.preparePosition(parsed.data, this.formatPositionId(this.positionSeq + 1));
    if (!prepared.ok) return this.reject(prepared.error);

    const admitted = this.ledger.admit([prepared.value]);
    if (!admitted.ok) return this.reject(admitted.error);

    const [position] = admitted.value;
    this.positionSeq += 1;
    this.afterOpen(position);
    return ok(position);
  }

  /** Buy CE and PE at the same strike */
  placeStraddle(input: PairRequestInput): Result<PositionPair, Rejection> {
    if (input.ceStrike !== input.peStrike) {
      return this.reject({ reason: "INVALID_REQUEST", message: "Straddle legs must share a strike" });
    }
    return this.placePair(input, "STRADDLE");
  }

  /** Buy CE and PE at different (usually OTM) strikes */
  placeStrangle(input: PairRequestInput): Result<PositionPair, Rejection> {
    if (input.ceStrike === input.peStrike) {
      return this.reject({ reason: "INVALID_REQUEST", message: "Strangle legs need different strikes" });
    }
    return this.placePair(input, "STRANGLE");
  }

  private placePair(
    input: PairRequestInput,
    strategy: "STRADDLE" | "STRANGLE"
  ): Result<PositionPair, Rejection> {
    const parsed = PairRequestSchema.safeParse(input);
    if (!parsed.success) {
      return this.reject({ reason: "INVALID_REQUEST", message: parsed.error.message });
    }
    const pair = parsed.data;
    const groupId = `${strategy}-${String(this.groupSeq + 1).padStart(4, "0")}`;

    const leg = (contract: OptionContract, entryPrice: number): TradeRequest => ({
      contract,
      action: "BUY",
      entryPrice,
      stopLoss: pair.stopLossPct !== undefined ? { pct: pair.stopLossPct } : undefined,
      target: pair.targetPct !== undefined ? { pct: pair.targetPct } : undefined,
      quantity: pair.quantity,
      trailingEnabled: true,
      isSpread: true,
      strategy,
      openedAt: pair.openedAt,
    });

    const ce = this.preparePosition(
      leg(makeContract(pair.underlying, pair.ceStrike, "CALL", pair.expiry, pair.lotSize), pair.ceEntryPrice),
      this.formatPositionId(this.positionSeq + 1),
      groupId
    );
    if (!ce.ok) return this.reject(ce.error);

    const pe = this.preparePosition(
      leg(makeContract(pair.underlying, pair.peStrike, "PUT", pair.expiry, pair.lotSize), pair.peEntryPrice),
      this.formatPositionId(this.positionSeq + 2),
      groupId
    );
    if (!pe.ok) return this.reject(pe.error);

    const admitted = this.ledger.admit([ce.value, pe.value]);
    if (!admitted.ok) return this.reject(admitted.error);

    const [ceLeg, peLeg] = admitted.value;
    this.positionSeq += 2;
    this.groupSeq += 1;
    this.afterOpen(ceLeg);
    this.afterOpen(peLeg);
    log.info(`${strategy} placed: CE ${pair.ceStrike} / PE ${pair.peStrike}`, { groupId });

    return ok({
      groupId,
      ce: ceLeg,
      pe: peLeg,
      totalRisk: ceLeg.riskAmount + peLeg.riskAmount,
    });
  }

  /** PENDING stage: everything short of ledger admission. No side effects. */
  private preparePosition(
    request: TradeRequest,
    id: string,
    groupId?: string
  ): Result<Position, Rejection> {
    const { action, entryPrice, contract, openedAt } = request;

    if (!this.clock.isMarketOpen(openedAt)) {
      return err<Rejection>({ reason: "MARKET_CLOSED", message: `Market is closed at ${openedAt.toISOString()}` });
    }

    const stopLossPrice = resolveLevel(
      action,
      entryPrice,
      request.stopLoss ?? { pct: this.policy.defaultStopLossPct },
      "loss"
    );
    const targetPrice = resolveLevel(
      action,
      entryPrice,
      request.target ?? { pct: this.policy.defaultTargetPct },
      "profit"
    );

    if (!isLossSide(action, stopLossPrice, entryPrice)) {
      return err<Rejection>({
        reason: "INVALID_STOP",
        message: `Stop ${stopLossPrice} is not on the loss side of entry ${entryPrice} for ${action}`,
      });
    }
    if (!hasValidThresholds(action, entryPrice, stopLossPrice, targetPrice) || targetPrice <= 0) {
      return err<Rejection>({
        reason: "INVALID_TARGET",
        message: `Target ${targetPrice} is not on the profit side of entry ${entryPrice} for ${action}`,
      });
    }

    let quantity = request.quantity;
    if (quantity === undefined) {
      const sizing = sizePosition({
        entryPrice,
        stopLossPrice,
        lotSize: contract.lotSize,
        riskBudget:
          request.riskAmount ?? this.ledger.accountBalance * this.policy.maxRiskPerTradeFraction,
        accountBalance: this.ledger.accountBalance,
        maxCapitalPerTradeFraction: this.policy.maxCapitalPerTradeFraction,
      });
      if (sizing.quantity < 1) {
        return err<Rejection>({
          reason: "INSUFFICIENT_CAPITAL",
          message: `No lot of ${contract.symbol} fits the capital cap (max ${sizing.maxLotsByCapital})`,
        });
      }
      quantity = sizing.quantity;
    }

    return ok(
      createPosition({
        id,
        contract,
        action,
        quantity,
        entryPrice,
        stopLossPrice,
        targetPrice,
        trailingEnabled: request.trailingEnabled,
        trailingStopPct: this.policy.trailingStopPct,
        openedAt,
        maxHoldingHours: request.maxHoldingHours ?? this.policy.maxHoldingHours,
        strategy: request.strategy,
        timeSlot: this.clock.timeSlot(openedAt),
        isSpread: request.isSpread,
        groupId,
      })
    );
  }

  private afterOpen(position: PositionSnapshot): void {
    this.emit("opened", position);
    this.persist("entry", () => this.journal?.recordEntry(position));

    if (this.ledger.hasDirectionalBias()) {
      const skew = this.ledger.balanceSkew();
      log.warn(`Directional bias: CE-PE balance ${skew}`);
      this.emit("bias_warning", skew);
    }
  }

  private reject(rejection: Rejection): { ok: false; error: Rejection } {
    log.warn(`Trade rejected: ${rejection.reason}: ${rejection.message}`);
    this.emit("rejected", rejection);
    return err(rejection);
  }

  // ─── Monitoring ────────────────────────────────────────

  /**
   * Evaluate every open position against one price observation. Iterates a
   * snapshot so closing one position never skips another.
   */
  onPriceTick(currentPrice: number, now: Date): Result<ExitEvent[], TickRejection> {
    const problem = this.checkTick(currentPrice, now, true);
    if (problem) {
      log.warn(`Tick rejected: ${problem}`, { price: currentPrice });
      this.emit("tick_rejected", problem, { price: currentPrice, timestamp: now });
      return err(problem);
    }
    this.lastTickAt = now;

    const exits: ExitEvent[] = [];
    for (const { id } of this.ledger.openPositions()) {
      const marked = this.ledger.markPrice(id, currentPrice);
      if (!marked) continue;
      const reason = decideExit(marked, currentPrice, now, this.clock);
      if (reason === null) continue;

      const closed = this.closeWith(id, currentPrice, reason, now);
      if (closed.ok) exits.push(closed.value);
    }
    return ok(exits);
  }

  /** Feed a tick sequence; bad ticks are collected, not fatal */
  replay(ticks: PriceTick[]): ReplayResult {
    const result: ReplayResult = { exits: [], rejectedTicks: [] };
    for (const tick of ticks) {
      const outcome = this.onPriceTick(tick.price, tick.timestamp);
      if (outcome.ok) result.exits.push(...outcome.value);
      else result.rejectedTicks.push({ tick, reason: outcome.error });
    }
    return result;
  }

  /** Close every open position regardless of its own triggers */
  forceCloseAll(
    currentPrice: number,
    now: Date,
    reason: ExitReason = "MARKET_CLOSE"
  ): Result<ExitEvent[], TickRejection> {
    const problem = this.checkTick(currentPrice, now, false);
    if (problem) return err(problem);

    const exits: ExitEvent[] = [];
    for (const position of this.ledger.openPositions()) {
      const closed = this.closeWith(position.id, currentPrice, reason, now);
      if (closed.ok) exits.push(closed.value);
    }
    log.info(`Force-closed ${exits.length} position(s): ${reason}`);
    return ok(exits);
  }

  // ─── Manual Operations ─────────────────────────────────

  closePosition(positionId: string, exitPrice: number, now: Date): Result<ExitEvent, ManualCloseError> {
    const problem = this.checkTick(exitPrice, now, false);
    if (problem) return err(problem);
    return this.closeWith(positionId, exitPrice, "MANUAL", now);
  }

  /**
   * Move a stop by hand. The new stop must sit on the loss side of both the
   * reference price (last mark, else entry) and the entry price.
   */
  updateStopLoss(
    positionId: string,
    newPrice: number,
    referencePrice?: number
  ): Result<PositionSnapshot, StopUpdateError> {
    return this.ledger.moveStopLoss(positionId, newPrice, referencePrice);
  }

  private closeWith(
    positionId: string,
    exitPrice: number,
    reason: ExitReason,
    at: Date
  ): Result<ExitEvent, LookupError> {
    const result = this.ledger.close(positionId, exitPrice, reason, at);
    if (!result.ok) return result;

    const closed = result.value;
    const event: ExitEvent = {
      positionId: closed.id,
      symbol: closed.contract.symbol,
      side: closed.side,
      exitReason: closed.exitReason,
      exitPrice: closed.exitPrice,
      realizedPnl: closed.realizedPnl,
      closedAt: closed.closedAt,
    };
    this.emit("exit", event);
    this.persist("exit", () => this.journal?.recordExit(closed));
    return ok(event);
  }

  private checkTick(price: number, now: Date, enforceOrder: boolean): TickRejection | null {
    if (!Number.isFinite(price) || price <= 0) return "INVALID_PRICE";
    if (!(now instanceof Date) || Number.isNaN(now.getTime())) return "INVALID_TIMESTAMP";
    if (enforceOrder && this.lastTickAt && now.getTime() < this.lastTickAt.getTime()) {
      return "STALE_TICK";
    }
    return null;
  }

  private persist(kind: "entry" | "exit", write: () => void): void {
    try {
      write();
    } catch (error) {
      log.error(`Journal ${kind} write failed`, { error: String(error) });
    }
  }

  private formatPositionId(seq: number): string {
    return `POS-${String(seq).padStart(6, "0")}`;
  }

  // ─── Queries ───────────────────────────────────────────

  getPosition(positionId: string): PositionSnapshot | ClosedPosition | undefined {
    return this.ledger.get(positionId);
  }

  openPositions(): PositionSnapshot[] {
    return this.ledger.openPositions();
  }

  closedPositions(): ClosedPosition[] {
    return this.ledger.closedPositions();
  }

  getSummary(now: Date = new Date()): EngineSummary {
    return {
      ...this.ledger.summary(),
      timeSlot: this.clock.timeSlot(now),
      marketOpen: this.clock.isMarketOpen(now),
    };
  }

  recommendStrategies(now: Date = new Date()): StrategySuggestion[] {
    return recommendStrategies(this.clock.timeSlot(now));
  }

  /** Begin a new trading day; refused while positions are open */
  startNewSession(accountBalance?: number): Result<void, "POSITIONS_OPEN"> {
    const reset = this.ledger.resetSession(accountBalance);
    if (reset.ok) this.lastTickAt = null;
    return reset;
  }
}

/** Turn an absolute or percentage level into a price on the requested side */
function resolveLevel(
  action: TradeAction,
  entryPrice: number,
  level: PriceLevel,
  side: "loss" | "profit"
): number {
  if ("price" in level) return level.price;
  const below = (action === "BUY") === (side === "loss");
  return below ? entryPrice * (1 - level.pct) : entryPrice * (1 + level.pct);
}
