import type { PortfolioRecord } from "./domain.ts";

export interface PortfolioSummary {
  readonly workingCount: number;
  readonly totalCount: number;
  readonly initialInvestment: number;
  readonly currentValue: number;
  readonly dividendsCollected: number;
  readonly gainLoss: number;
  readonly gainLossPercent: number;
  readonly totalReturn: number;
  readonly totalReturnPercent: number;
  readonly bestPerformer: PortfolioRecord | undefined;
  readonly worstPerformer: PortfolioRecord | undefined;
  readonly topDividendPayer: PortfolioRecord | undefined;
}

const sum = (records: readonly PortfolioRecord[], pick: (r: PortfolioRecord) => number) =>
  records.reduce((total, r) => total + pick(r), 0);

/** First record with the highest `score`. */
function maxBy(
  records: readonly PortfolioRecord[],
  score: (r: PortfolioRecord) => number,
): PortfolioRecord | undefined {
  let best: PortfolioRecord | undefined;
  for (const record of records) {
    if (best === undefined || score(record) > score(best)) best = record;
  }
  return best;
}

export function summarizePortfolio(
  working: readonly PortfolioRecord[],
  failedCount: number,
  investmentAmount: number,
): PortfolioSummary {
  const initialInvestment = working.length * investmentAmount;
  const currentValue = sum(working, (r) => r.currentValue);
  const dividendsCollected = sum(working, (r) => r.dividendsCollected);
  const gainLoss = currentValue - initialInvestment;
  const totalReturn = currentValue + dividendsCollected - initialInvestment;
  const pct = (value: number) =>
    initialInvestment > 0 ? (value / initialInvestment) * 100 : 0;

  return {
    workingCount: working.length,
    totalCount: working.length + failedCount,
    initialInvestment,
    currentValue,
    dividendsCollected,
    gainLoss,
    gainLossPercent: pct(gainLoss),
    totalReturn,
    totalReturnPercent: pct(totalReturn),
    bestPerformer: maxBy(working, (r) => r.gainLossPercent),
    worstPerformer: maxBy(working, (r) => -r.gainLossPercent),
    topDividendPayer: maxBy(working, (r) => r.dividendsCollected),
  };
}
