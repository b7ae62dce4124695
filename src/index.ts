/**
 * Intraday Options Engine: public API
 */

export { LifecycleEngine } from "./engine/lifecycle-engine.js";
export type {
  EngineSummary,
  LifecycleEngineOptions,
  PositionPair,
  ReplayResult,
} from "./engine/lifecycle-engine.js";
export { PortfolioLedger } from "./engine/portfolio-ledger.js";
export { SessionClock, IST_OFFSET_MINUTES } from "./engine/session-clock.js";
export { buildRiskPolicy, DEFAULT_RISK_POLICY, type RiskPolicy } from "./engine/risk-policy.js";
export {
  EXIT_PRIORITY,
  decideExit,
  evaluateExit,
  updateTrailingStop,
} from "./engine/exit-evaluator.js";
export { sizePosition } from "./engine/position-sizing.js";
export { recommendStrategies } from "./engine/strategy-playbook.js";
export { JsonFileTradeJournal, MemoryTradeJournal } from "./storage/trade-journal.js";
export type { TradeJournal } from "./storage/trade-journal.js";
export { makeContract } from "./types/options.js";
export type { IntradayStrategy, OptionContract, OptionSide, TradeAction } from "./types/options.js";
export type * from "./types/position.js";
export type { Result } from "./types/result.js";
