/**
 * Portfolio Ledger
 *
 * Owns every position once admitted. Tracks:
 *   - open positions and closed history
 *   - CALL / PUT / spread counters against the risk policy
 *   - daily realized P&L and the daily-loss halt (latched for the session)
 *   - last mark per open position for unrealized P&L
 *
 * Live records never leave this class. Readers get frozen snapshots; the
 * trailing ratchet and manual stop moves go through `markPrice` and
 * `moveStopLoss`.
 */

import type { OptionSide } from "../types/options.js";
import type {
  ClosedPosition,
  ExitReason,
  LookupError,
  PortfolioSummary,
  Position,
  PositionSnapshot,
  Rejection,
  StopUpdateError,
} from "../types/position.js";
import { err, ok, type Result } from "../types/result.js";
import { updateTrailingStop } from "./exit-evaluator.js";
import { closePositionRecord, computePnl, isLossSide, snapshotPosition } from "./position.js";
import type { RiskPolicy } from "./risk-policy.js";
import { moduleLogger, positionLogger } from "../utils/logger.js";

const log = moduleLogger("ledger");

export interface AdmissionCandidate {
  side: OptionSide;
  riskAmount: number;
  isSpread: boolean;
}

export interface LedgerCounts {
  ce: number;
  pe: number;
  spread: number;
}

export class PortfolioLedger {
  private readonly open = new Map<string, Position>();
  private readonly marks = new Map<string, number>();
  private closed: ClosedPosition[] = [];
  private counters: LedgerCounts = { ce: 0, pe: 0, spread: 0 };
  private realizedToday = 0;
  private halted = false;

  constructor(
    private readonly policy: RiskPolicy,
    private balance: number
  ) {}

  // ─── Admission ─────────────────────────────────────────

  /**
   * Check one new position against every limit. First violation wins, in
   * order: POSITION_LIMIT, SIDE_LIMIT, SPREAD_LIMIT, RISK_CAP_EXCEEDED,
   * DAILY_LOSS_LIMIT_HIT.
   */
  canOpen(side: OptionSide, riskAmount: number, isSpread: boolean): Result<void, Rejection> {
    return this.canOpenAll([{ side, riskAmount, isSpread }]);
  }

  /** Same checks for several legs that must be admitted together */
  canOpenAll(candidates: AdmissionCandidate[]): Result<void, Rejection> {
    const projected: LedgerCounts = { ...this.counters };

    for (const candidate of candidates) {
      applyCandidate(projected, candidate, 1);
      const rejection = this.checkLimits(projected, candidate);
      if (rejection) return err(rejection);
    }
    return ok(undefined);
  }

  private checkLimits(projected: LedgerCounts, candidate: AdmissionCandidate): Rejection | null {
    const p = this.policy;
    const total = projected.ce + projected.pe + projected.spread;

    if (total > p.maxTotalPositions) {
      return {
        reason: "POSITION_LIMIT",
        message: `Maximum intraday positions (${p.maxTotalPositions}) reached`,
      };
    }
    if (candidate.side === "CALL" && projected.ce > p.maxCePositions) {
      return { reason: "SIDE_LIMIT", message: `Maximum CE positions (${p.maxCePositions}) reached` };
    }
    if (candidate.side === "PUT" && projected.pe > p.maxPePositions) {
      return { reason: "SIDE_LIMIT", message: `Maximum PE positions (${p.maxPePositions}) reached` };
    }
    if (candidate.isSpread && projected.spread > p.maxSpreadPositions) {
      return {
        reason: "SPREAD_LIMIT",
        message: `Maximum spread positions (${p.maxSpreadPositions}) reached`,
      };
    }

    const riskCap = p.maxRiskPerTradeFraction * this.balance;
    if (candidate.riskAmount > riskCap) {
      return {
        reason: "RISK_CAP_EXCEEDED",
        message: `Trade risk ${candidate.riskAmount.toFixed(2)} exceeds cap ${riskCap.toFixed(2)}`,
      };
    }
    if (this.isHalted) {
      return {
        reason: "DAILY_LOSS_LIMIT_HIT",
        message: `Daily loss limit reached (${this.realizedToday.toFixed(2)})`,
      };
    }
    return null;
  }

  /**
   * Admit a validated position. Does not re-check limits. The ledger stores
   * its own copy, so later changes to `position` have no effect here.
   */
  openPosition(position: Position): PositionSnapshot {
    const record: Position = { ...position };
    this.open.set(record.id, record);
    applyCandidate(this.counters, record, 1);
    positionLogger("ledger", record.id).info(
      `Opened ${record.action} ${record.quantity} x ${record.contract.symbol} @ ${record.entryPrice}`,
      { stop: record.stopLossPrice, target: record.targetPrice, risk: record.riskAmount }
    );
    return snapshotPosition(record);
  }

  /** Validate-and-admit: all positions are opened, or none */
  admit(positions: Position[]): Result<PositionSnapshot[], Rejection> {
    const check = this.canOpenAll(positions);
    if (!check.ok) return check;
    return ok(positions.map((position) => this.openPosition(position)));
  }

  // ─── Closing ───────────────────────────────────────────

  close(
    positionId: string,
    exitPrice: number,
    exitReason: ExitReason,
    closedAt: Date
  ): Result<ClosedPosition, LookupError> {
    const position = this.open.get(positionId);
    if (!position) {
      return err<LookupError>(this.closed.some((c) => c.id === positionId) ? "ALREADY_CLOSED" : "UNKNOWN_POSITION");
    }

    const closed = closePositionRecord(position, exitPrice, exitReason, closedAt);
    this.open.delete(positionId);
    this.marks.delete(positionId);
    this.closed.push(closed);
    applyCandidate(this.counters, position, -1);
    this.realizedToday += closed.realizedPnl;

    if (!this.halted && this.realizedToday <= -this.dailyLossLimit) {
      this.halted = true;
      log.warn(`Daily loss limit hit (${this.realizedToday.toFixed(2)}); new entries blocked for the session`);
    }

    positionLogger("ledger", positionId).info(
      `Closed ${exitReason} @ ${exitPrice}, P&L ${closed.realizedPnl.toFixed(2)}`
    );
    return ok(closed);
  }

  // ─── Stop Updates ──────────────────────────────────────

  /**
   * Move a stop by hand. The new stop must sit on the loss side of both the
   * reference price (given, else last mark, else entry) and the entry price.
   */
  moveStopLoss(
    positionId: string,
    newPrice: number,
    referencePrice?: number
  ): Result<PositionSnapshot, StopUpdateError> {
    const record = this.open.get(positionId);
    if (!record) {
      return err<StopUpdateError>(
        this.closed.some((c) => c.id === positionId) ? "ALREADY_CLOSED" : "UNKNOWN_POSITION"
      );
    }

    const plog = positionLogger("ledger", positionId);
    const reference = referencePrice ?? this.marks.get(positionId) ?? record.entryPrice;
    const valid =
      Number.isFinite(newPrice) &&
      isLossSide(record.action, newPrice, reference) &&
      isLossSide(record.action, newPrice, record.entryPrice);

    if (!valid) {
      plog.warn(`Invalid stop ${newPrice} (reference ${reference})`);
      return err<StopUpdateError>("INVALID_STOP");
    }

    plog.info(`Stop moved ${record.stopLossPrice} -> ${newPrice}`);
    record.stopLossPrice = newPrice;
    return ok(snapshotPosition(record));
  }

  // ─── Marks & Queries ───────────────────────────────────

  /**
   * Record the latest price for an open position and advance its trailing
   * stop. Returns the updated snapshot, or undefined if it is not open.
   */
  markPrice(positionId: string, price: number): PositionSnapshot | undefined {
    const record = this.open.get(positionId);
    if (!record) return undefined;
    this.marks.set(positionId, price);
    updateTrailingStop(record, price);
    return snapshotPosition(record);
  }

  lastMark(positionId: string): number | undefined {
    return this.marks.get(positionId);
  }

  unrealizedPnl(): number {
    let total = 0;
    for (const [id, price] of this.marks) {
      const position = this.open.get(id);
      if (position) total += computePnl(position, price);
    }
    return total;
  }

  /** CALL count minus PUT count */
  balanceSkew(): number {
    return this.counters.ce - this.counters.pe;
  }

  hasDirectionalBias(): boolean {
    return Math.abs(this.balanceSkew()) > this.policy.biasWarningThreshold;
  }

  getOpen(positionId: string): PositionSnapshot | undefined {
    const record = this.open.get(positionId);
    return record ? snapshotPosition(record) : undefined;
  }

  get(positionId: string): PositionSnapshot | ClosedPosition | undefined {
    return this.getOpen(positionId) ?? this.closed.find((c) => c.id === positionId);
  }

  /** Frozen copies of the open set, safe to iterate while closing */
  openPositions(): PositionSnapshot[] {
    return [...this.open.values()].map(snapshotPosition);
  }

  closedPositions(): ClosedPosition[] {
    return [...this.closed];
  }

  counts(): Readonly<LedgerCounts> {
    return { ...this.counters };
  }

  get dailyRealizedPnl(): number {
    return this.realizedToday;
  }

  get accountBalance(): number {
    return this.balance;
  }

  get dailyLossLimit(): number {
    return this.policy.maxDailyLossFraction * this.balance;
  }

  get isHalted(): boolean {
    return this.halted || this.realizedToday <= -this.dailyLossLimit;
  }

  summary(): PortfolioSummary {
    const pnls = this.closed.map((c) => c.realizedPnl);
    const winning = pnls.filter((p) => p > 0).length;
    const losing = pnls.filter((p) => p < 0).length;
    const total = pnls.reduce((sum, p) => sum + p, 0);

    return {
      openPositionCount: this.open.size,
      ceCount: this.counters.ce,
      peCount: this.counters.pe,
      spreadCount: this.counters.spread,
      dailyPnl: this.realizedToday,
      unrealizedPnl: this.unrealizedPnl(),
      totalTrades: pnls.length,
      winningTrades: winning,
      losingTrades: losing,
      winRate: pnls.length > 0 ? (winning / pnls.length) * 100 : 0,
      averagePnl: pnls.length > 0 ? total / pnls.length : 0,
      maxDrawdown: pnls.length > 0 ? Math.min(...pnls) : 0,
      cePeBalance: this.balanceSkew(),
      directionalBias: this.hasDirectionalBias(),
      tradingHalted: this.isHalted,
    };
  }

  /**
   * Start a new trading day. Refused while positions are still open.
   */
  resetSession(balance?: number): Result<void, "POSITIONS_OPEN"> {
    if (this.open.size > 0) return err<"POSITIONS_OPEN">("POSITIONS_OPEN");
    if (balance !== undefined) this.balance = balance;
    this.closed = [];
    this.realizedToday = 0;
    this.halted = false;
    log.info(`Session reset, balance ${this.balance}`);
    return ok(undefined);
  }
}

function applyCandidate(counts: LedgerCounts, candidate: AdmissionCandidate, delta: 1 | -1): void {
  if (candidate.side === "CALL") counts.ce += delta;
  else counts.pe += delta;
  if (candidate.isSpread) counts.spread += delta;
}
