import assert from "node:assert/strict";
import { test } from "node:test";
import type { PortfolioRecord } from "./domain.ts";
import { summarizePortfolio } from "./summary.ts";

function record(symbol: string, overrides: Partial<PortfolioRecord> = {}): PortfolioRecord {
  return {
    symbol,
    displaySymbol: symbol,
    initialPrice: 50,
    sharesPurchased: 200,
    currentPrice: 50,
    currentValue: 10_000,
    dividendsCollected: 0,
    dividendPayments: 0,
    gainLoss: 0,
    gainLossPercent: 0,
    totalReturn: 0,
    totalReturnPercent: 0,
    status: "Verified",
    isFallbackDate: false,
    actualStartDate: "2025-01-02",
    currentPriceDate: "2025-06-16",
    detail: undefined,
    ...overrides,
  };
}

const up = record("UP", { currentValue: 11_000, dividendsCollected: 150, gainLoss: 1_000, gainLossPercent: 10 });
const down = record("DOWN", { currentValue: 9_600, dividendsCollected: 80, gainLoss: -400, gainLossPercent: -4 });

test("summarizePortfolio: totals over the working records", () => {
  const summary = summarizePortfolio([up, down], 1, 10_000);
  assert.equal(summary.workingCount, 2);
  assert.equal(summary.totalCount, 3);
  assert.equal(summary.initialInvestment, 20_000);
  assert.equal(summary.currentValue, 20_600);
  assert.equal(summary.dividendsCollected, 230);
  assert.equal(summary.gainLoss, 600);
  assert.ok(Math.abs(summary.gainLossPercent - 3) < 1e-9);
  assert.equal(summary.totalReturn, 830);
  assert.ok(Math.abs(summary.totalReturnPercent - 4.15) < 1e-9);
});

test("summarizePortfolio: best, worst and top dividend payer", () => {
  const summary = summarizePortfolio([down, up], 0, 10_000);
  assert.equal(summary.bestPerformer?.symbol, "UP");
  assert.equal(summary.worstPerformer?.symbol, "DOWN");
  assert.equal(summary.topDividendPayer?.symbol, "UP");
});

test("summarizePortfolio: the first record wins a tie", () => {
  const summary = summarizePortfolio([record("A"), record("B")], 0, 10_000);
  assert.equal(summary.bestPerformer?.symbol, "A");
  assert.equal(summary.worstPerformer?.symbol, "A");
  assert.equal(summary.topDividendPayer?.symbol, "A");
});

test("summarizePortfolio: no working records gives zero percentages", () => {
  const summary = summarizePortfolio([], 4, 10_000);
  assert.equal(summary.initialInvestment, 0);
  assert.equal(summary.gainLossPercent, 0);
  assert.equal(summary.totalReturnPercent, 0);
  assert.equal(summary.totalCount, 4);
  assert.equal(summary.bestPerformer, undefined);
});
