/**
 * Express API Server
 *
 * Exposes one lifecycle engine over HTTP:
 *   GET  /api/summary                   Portfolio summary (counts, P&L, win rate, balance)
 *   GET  /api/positions                 Open positions
 *   GET  /api/positions/closed          Closed positions (today)
 *   POST /api/trades                    Place a single CE/PE trade
 *   POST /api/straddle                  Buy CE + PE at one strike
 *   POST /api/strangle                  Buy CE + PE at two strikes
 *   POST /api/ticks                     Feed one price tick
 *   POST /api/positions/:id/stop-loss   Move a stop by hand
 *   POST /api/positions/:id/close       Manual exit
 *   POST /api/close-all                 Session-end sweep
 *   GET  /api/playbook                  Strategy suggestions for the current slot
 *   GET  /api/journal                   Journal performance summary
 *
 * Start: npm run dev
 */

import express, { type Response } from "express";
import { pathToFileURL } from "url";
import type { ZodError } from "zod";
import { config, riskPolicyFromConfig } from "./config/index.js";
import { LifecycleEngine } from "./engine/lifecycle-engine.js";
import { SessionClock } from "./engine/session-clock.js";
import { JsonFileTradeJournal, type MemoryTradeJournal } from "./storage/trade-journal.js";
import type { LookupError, Rejection, RejectionReason, TickRejection } from "./types/position.js";
import {
  ClosePositionSchema,
  PriceTickSchema,
  StopLossUpdateSchema,
} from "./utils/validation.js";
import { logger, moduleLogger } from "./utils/logger.js";

const log = moduleLogger("server");

type ErrorCode = RejectionReason | LookupError | TickRejection;

/** Lookups 404, malformed input 400, everything the engine refuses 409 */
export function httpStatus(code: ErrorCode): number {
  switch (code) {
    case "UNKNOWN_POSITION":
    case "ALREADY_CLOSED":
      return 404;
    case "INVALID_REQUEST":
    case "INVALID_PRICE":
    case "INVALID_TIMESTAMP":
    case "STALE_TICK":
      return 400;
    default:
      return 409;
  }
}

function sendError(res: Response, code: ErrorCode, message?: string): void {
  res.status(httpStatus(code)).json({ success: false, error: code, message });
}

function sendRejection(res: Response, rejection: Rejection): void {
  sendError(res, rejection.reason, rejection.message);
}

function sendInvalidBody(res: Response, error: ZodError): void {
  sendError(res, "INVALID_REQUEST", error.message);
}

export function createApp(engine: LifecycleEngine, journal?: MemoryTradeJournal): express.Express {
  const app = express();
  app.use(express.json());

  app.get("/api/summary", (_req, res) => {
    res.json({ success: true, data: engine.getSummary() });
  });

  app.get("/api/positions", (_req, res) => {
    res.json({ success: true, data: engine.openPositions() });
  });

  app.get("/api/positions/closed", (_req, res) => {
    res.json({ success: true, data: engine.closedPositions() });
  });

  app.post("/api/trades", (req, res) => {
    const result = engine.placeTrade(req.body);
    if (result.ok) res.status(201).json({ success: true, data: result.value });
    else sendRejection(res, result.error);
  });

  app.post("/api/straddle", (req, res) => {
    const result = engine.placeStraddle(req.body);
    if (result.ok) res.status(201).json({ success: true, data: result.value });
    else sendRejection(res, result.error);
  });

  app.post("/api/strangle", (req, res) => {
    const result = engine.placeStrangle(req.body);
    if (result.ok) res.status(201).json({ success: true, data: result.value });
    else sendRejection(res, result.error);
  });

  app.post("/api/ticks", (req, res) => {
    const tick = PriceTickSchema.safeParse(req.body);
    if (!tick.success) {
      sendInvalidBody(res, tick.error);
      return;
    }
    const result = engine.onPriceTick(tick.data.price, tick.data.timestamp);
    if (result.ok) res.json({ success: true, data: { exits: result.value } });
    else sendError(res, result.error);
  });

  app.post("/api/positions/:id/stop-loss", (req, res) => {
    const body = StopLossUpdateSchema.safeParse(req.body);
    if (!body.success) {
      sendInvalidBody(res, body.error);
      return;
    }
    const result = engine.updateStopLoss(req.params.id, body.data.price, body.data.referencePrice);
    if (result.ok) res.json({ success: true, data: result.value });
    else sendError(res, result.error);
  });

  app.post("/api/positions/:id/close", (req, res) => {
    const body = ClosePositionSchema.safeParse(req.body);
    if (!body.success) {
      sendInvalidBody(res, body.error);
      return;
    }
    const result = engine.closePosition(req.params.id, body.data.price, body.data.timestamp ?? new Date());
    if (result.ok) res.json({ success: true, data: result.value });
    else sendError(res, result.error);
  });

  app.post("/api/close-all", (req, res) => {
    const body = ClosePositionSchema.safeParse(req.body);
    if (!body.success) {
      sendInvalidBody(res, body.error);
      return;
    }
    const result = engine.forceCloseAll(body.data.price, body.data.timestamp ?? new Date());
    if (result.ok) res.json({ success: true, data: { exits: result.value } });
    else sendError(res, result.error);
  });

  app.get("/api/playbook", (_req, res) => {
    res.json({ success: true, data: engine.recommendStrategies() });
  });

  app.get("/api/journal", (_req, res) => {
    if (!journal) {
      res.status(404).json({ success: false, error: "JOURNAL_NOT_CONFIGURED" });
      return;
    }
    res.json({ success: true, data: journal.summary() });
  });

  return app;
}

function startServer(): void {
  logger.level = config.logLevel;
  const journal = new JsonFileTradeJournal(config.journalPath);
  const engine = new LifecycleEngine({
    policy: riskPolicyFromConfig(config),
    accountBalance: config.accountBalance,
    clock: new SessionClock(config.exchangeUtcOffsetMinutes),
    journal,
  });

  engine.on("exit", (event) => {
    log.info(`Exit ${event.positionId} ${event.exitReason} P&L ${event.realizedPnl.toFixed(2)}`);
  });
  engine.on("bias_warning", (skew) => {
    log.warn(`CE/PE exposure skewed by ${skew}`);
  });

  const app = createApp(engine, journal);
  app.listen(config.port, () => {
    log.info(`═══════════════════════════════════════════`);
    log.info(`  Intraday Options Engine`);
    log.info(`  http://localhost:${config.port}`);
    log.info(`  Balance: ${config.accountBalance.toLocaleString()}`);
    log.info(`═══════════════════════════════════════════`);
  });
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    startServer();
  } catch (error) {
    log.error("Server startup failed", { error: String(error) });
    process.exit(1);
  }
}
