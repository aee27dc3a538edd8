// Console output. Every function returns a string.

import type {
  PortfolioRecord,
  VerificationStatus,
  VerificationSummary,
} from "./domain.ts";
import { signed } from "./portfolio-record.ts";
import type { PortfolioSummary } from "./summary.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

const RULE = "=".repeat(60);

// --- Values ---

const amountFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 1234.5 -> "$1,234.50", -20 -> "-$20.00" */
export function usd(value: number): string {
  const text = `$${amountFormat.format(Math.abs(value))}`;
  return value < 0 ? `-${text}` : text;
}

export function statusLabel(status: VerificationStatus): string {
  switch (status) {
    case "Verified":
      return "✅ VERIFIED";
    case "AlternateSource":
      return "🟡 ALT SOURCE";
    case "NoData":
      return "🔴 NO DATA";
    case "Error":
      return "🔴 ERROR";
  }
}

function colorFor(value: number): string {
  if (value > 0) return GREEN;
  if (value < 0) return RED;
  return "";
}

function paint(text: string, color: string): string {
  return color === "" ? text : `${color}${text}${RESET}`;
}

// --- Sections ---

export function formatBanner(startDate: string, investmentAmount: number): string {
  return [
    RULE,
    `${BOLD}INCOME INVESTING - INITIAL PURCHASE ANALYSIS${RESET}`,
    RULE,
    `Reference Date: ${startDate} (Raw Market Prices - Not Dividend Adjusted)`,
    `Investment Amount: ${usd(investmentAmount)} per symbol`,
    RULE,
  ].join("\n");
}

interface Column {
  readonly title: string;
  readonly width: number;
  readonly cell: (r: PortfolioRecord) => string;
  readonly color?: (r: PortfolioRecord) => string;
}

const COLUMNS: readonly Column[] = [
  { title: "Initial", width: 10, cell: (r) => r.initialPrice.toFixed(2) },
  { title: "Shares", width: 10, cell: (r) => r.sharesPurchased.toFixed(2) },
  { title: "Current", width: 10, cell: (r) => r.currentPrice.toFixed(2) },
  { title: "Value", width: 12, cell: (r) => r.currentValue.toFixed(2) },
  { title: "Dividends", width: 10, cell: (r) => r.dividendsCollected.toFixed(2) },
  {
    title: "Gain/Loss",
    width: 11,
    cell: (r) => r.gainLoss.toFixed(2),
    color: (r) => colorFor(r.gainLoss),
  },
  {
    title: "G/L %",
    width: 7,
    cell: (r) => signed(r.gainLossPercent),
    color: (r) => colorFor(r.gainLoss),
  },
  {
    title: "Total Ret",
    width: 11,
    cell: (r) => r.totalReturn.toFixed(2),
    color: (r) => colorFor(r.totalReturn),
  },
  {
    title: "TR %",
    width: 7,
    cell: (r) => signed(r.totalReturnPercent),
    color: (r) => colorFor(r.totalReturn),
  },
];

const SYMBOL_WIDTH = 8;

export function formatTableHeader(): string {
  const titles = COLUMNS.map((c) => c.title.padStart(c.width)).join(" ");
  return `  ${"Symbol".padEnd(SYMBOL_WIDTH)} ${titles}  Status`;
}

export function formatRecordRow(record: PortfolioRecord): string {
  const cells = COLUMNS.map((c) =>
    paint(c.cell(record).padStart(c.width), c.color?.(record) ?? "")
  ).join(" ");
  return `  ${record.displaySymbol.padEnd(SYMBOL_WIDTH)} ${cells}  ${statusLabel(record.status)}`;
}

export function formatWorkingTable(working: readonly PortfolioRecord[]): string {
  const header = formatTableHeader();
  return [
    "=".repeat(header.length),
    `${BOLD}${header}${RESET}`,
    "-".repeat(header.length),
    ...working.map(formatRecordRow),
  ].join("\n");
}

export function formatFailedList(failed: readonly PortfolioRecord[]): string {
  return [
    RULE,
    `${RED}${BOLD}FAILED SYMBOLS (No Data Available)${RESET}`,
    RULE,
    ...failed.map((r) =>
      `  ${r.displaySymbol.padEnd(SYMBOL_WIDTH)} ${statusLabel(r.status)}` +
      (r.detail === undefined ? "" : `  ${DIM}${r.detail}${RESET}`)
    ),
  ].join("\n");
}

export function verificationRate(summary: VerificationSummary): number {
  return summary.total === 0 ? 0 : (summary.verifiedCount / summary.total) * 100;
}

export function formatVerificationSummary(summary: VerificationSummary): string {
  const lines = [
    RULE,
    `${BOLD}VERIFICATION SUMMARY${RESET}`,
    RULE,
    `Prices Verified: ${summary.verifiedCount}/${summary.total} symbols`,
    `Verification Rate: ${verificationRate(summary).toFixed(1)}%`,
  ];
  if (summary.unverified.length > 0) {
    lines.push("", "Unverified symbols:");
    for (const check of summary.unverified) {
      lines.push(
        `  ${check.symbol}: ${usd(check.price)} - ${check.reason ?? "Alternative source used"}`,
      );
    }
  }
  return lines.join("\n");
}

export function formatPortfolioSummary(summary: PortfolioSummary): string {
  const lines = [
    RULE,
    `${BOLD}PORTFOLIO SUMMARY${RESET}`,
    RULE,
    `Working symbols: ${summary.workingCount}/${summary.totalCount}`,
    `Total Initial Investment: ${usd(summary.initialInvestment)}`,
    `Total Current Value: ${usd(summary.currentValue)}`,
    `Total Dividends Collected: ${usd(summary.dividendsCollected)}`,
    `Total Gain/Loss (Price Only): ${paint(usd(summary.gainLoss), colorFor(summary.gainLoss))} (${signed(summary.gainLossPercent)}%)`,
    `Total Return (Price + Dividends): ${paint(usd(summary.totalReturn), colorFor(summary.totalReturn))} (${signed(summary.totalReturnPercent)}%)`,
  ];

  const { bestPerformer, worstPerformer, topDividendPayer } = summary;
  if (bestPerformer !== undefined && worstPerformer !== undefined && topDividendPayer !== undefined) {
    lines.push(
      "",
      `Best Price Performer: ${bestPerformer.displaySymbol} (${signed(bestPerformer.gainLossPercent)}%)`,
      `Worst Price Performer: ${worstPerformer.displaySymbol} (${signed(worstPerformer.gainLossPercent)}%)`,
      `Highest Dividend Payer: ${topDividendPayer.displaySymbol} (${usd(topDividendPayer.dividendsCollected)})`,
    );
  }
  return lines.join("\n");
}

// --- Fatal errors ---

export function formatFatal(title: string, hint: string): string {
  return [
    "",
    `${RED}${BOLD}  ✗ ${title}${RESET}`,
    `  ${DIM}${hint}${RESET}`,
    "",
  ].join("\n");
}
