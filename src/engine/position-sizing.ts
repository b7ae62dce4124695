/**
 * Lot sizing from a risk budget.
 *
 * lots = floor(riskBudget / (|entry - stop| x lotSize)), at least 1, then
 * capped so premium outlay stays within maxCapitalPerTradeFraction of the
 * balance. A result of 0 means not even one lot fits the capital cap.
 */

export interface SizingInput {
  entryPrice: number;
  stopLossPrice: number;
  lotSize: number;
  riskBudget: number;
  accountBalance: number;
  maxCapitalPerTradeFraction: number;
}

export interface SizingResult {
  quantity: number;
  riskPerLot: number;
  maxLotsByCapital: number;
}

export function sizePosition(input: SizingInput): SizingResult {
  const riskPerLot = Math.abs(input.entryPrice - input.stopLossPrice) * input.lotSize;
  const premiumPerLot = input.entryPrice * input.lotSize;

  const maxLotsByCapital =
    premiumPerLot > 0
      ? Math.floor((input.accountBalance * input.maxCapitalPerTradeFraction) / premiumPerLot)
      : 0;

  if (riskPerLot <= 0) {
    return { quantity: 0, riskPerLot, maxLotsByCapital };
  }

  const byRisk = Math.max(1, Math.floor(input.riskBudget / riskPerLot));
  return {
    quantity: Math.min(byRisk, maxLotsByCapital),
    riskPerLot,
    maxLotsByCapital,
  };
}
