/**
 * Index option contract type definitions.
 */

/** CE / PE */
export type OptionSide = "CALL" | "PUT";

/** Direction of the opening trade */
export type TradeAction = "BUY" | "SELL";

/** Single index option contract. Treated as opaque identity by the engine. */
export interface OptionContract {
  symbol: string;
  underlying: string;
  side: OptionSide;
  strike: number;
  expiry: Date;
  lotSize: number; // 50 for NIFTY
}

/** Intraday strategy tags carried on a position for journaling */
export type IntradayStrategy =
  | "MOMENTUM_BREAKOUT"
  | "MEAN_REVERSION"
  | "GAP_TRADING"
  | "NEWS_BASED"
  | "TECHNICAL_BREAKOUT"
  | "VOLATILITY_EXPANSION"
  | "STRADDLE"
  | "STRANGLE"
  | "MANUAL";

/** Build a contract with the conventional `NIFTY25000CE` style symbol */
export function makeContract(
  underlying: string,
  strike: number,
  side: OptionSide,
  expiry: Date,
  lotSize: number = 50
): OptionContract {
  return {
    symbol: `${underlying}${strike}${side === "CALL" ? "CE" : "PE"}`,
    underlying,
    side,
    strike,
    expiry,
    lotSize,
  };
}
