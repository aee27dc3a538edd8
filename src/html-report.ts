import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Console, Effect } from "effect";
import type { BatchReport, PortfolioRecord } from "./domain.ts";
import { formatDdMmYyyy } from "./dates.ts";
import { statusLabel, usd } from "./format.ts";
import { FALLBACK_MARKER, signed } from "./portfolio-record.ts";
import type { PortfolioSummary } from "./summary.ts";

export interface HtmlReportInput {
  readonly report: BatchReport;
  readonly summary: PortfolioSummary;
  readonly investmentAmount: number;
  readonly startDate: string;
  readonly analysisDate: string;
}

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

function trendClass(value: number): string {
  if (value > 0) return "gain";
  if (value < 0) return "loss";
  return "";
}

function signClass(value: number): string {
  return value >= 0 ? "positive" : "negative";
}

export function fallbackNotes(working: readonly PortfolioRecord[]): readonly string[] {
  return working
    .filter((r) => r.isFallbackDate)
    .map((r) =>
      `${FALLBACK_MARKER}${r.symbol}: Started trading on ${formatDdMmYyyy(r.actualStartDate ?? "Unknown")}`
    );
}

// --- Fragments ---

function summaryItem(value: string, label: string, valueClass = ""): string {
  const cls = valueClass === "" ? "summary-value" : `summary-value ${valueClass}`;
  return `
        <div class="summary-item">
          <div class="${cls}">${value}</div>
          <div class="summary-label">${escapeHtml(label)}</div>
        </div>`;
}

function numericCell(value: number, text: string, extraClass = ""): string {
  const cls = extraClass === "" ? "number" : `number ${extraClass}`;
  return `<td class="${cls}" data-sort="${value}">${escapeHtml(text)}</td>`;
}

export function renderRow(record: PortfolioRecord): string {
  const rowClass = record.isFallbackDate ? ' class="fallback"' : "";
  const gain = trendClass(record.gainLoss);
  const total = trendClass(record.totalReturn);
  return [
    `        <tr${rowClass}>`,
    `          <td class="symbol" data-sort="${escapeHtml(record.symbol)}">${escapeHtml(record.displaySymbol)}</td>`,
    `          ${numericCell(record.initialPrice, usd(record.initialPrice))}`,
    `          ${numericCell(record.sharesPurchased, record.sharesPurchased.toFixed(2))}`,
    `          ${numericCell(record.currentPrice, usd(record.currentPrice))}`,
    `          ${numericCell(record.currentValue, usd(record.currentValue))}`,
    `          ${numericCell(record.dividendsCollected, usd(record.dividendsCollected))}`,
    `          ${numericCell(record.gainLoss, usd(record.gainLoss), gain)}`,
    `          ${numericCell(record.gainLossPercent, `${signed(record.gainLossPercent)}%`, gain)}`,
    `          ${numericCell(record.totalReturn, usd(record.totalReturn), total)}`,
    `          ${numericCell(record.totalReturnPercent, `${signed(record.totalReturnPercent)}%`, total)}`,
    `          <td class="status" data-sort="${record.status}">${statusLabel(record.status)}</td>`,
    "        </tr>",
  ].join("\n");
}

function failedTable(failed: readonly PortfolioRecord[]): string {
  if (failed.length === 0) return "";
  const rows = failed.map((r) =>
    `        <tr><td class="symbol">${escapeHtml(r.displaySymbol)}</td><td class="status">${statusLabel(r.status)}</td><td>${escapeHtml(r.detail ?? "")}</td></tr>`
  );
  return `
    <div class="failed">
      <h2>❌ Failed to Retrieve Data</h2>
      <table>
        <thead><tr><th>Symbol</th><th>Status</th><th>Reason</th></tr></thead>
        <tbody>
${rows.join("\n")}
        </tbody>
      </table>
    </div>`;
}

function notesSection(notes: readonly string[]): string {
  if (notes.length === 0) return "";
  return `
    <div class="notes">
      <h3>📝 Notes</h3>
      <ul>
${notes.map((n) => `        <li>${escapeHtml(n)}</li>`).join("\n")}
      </ul>
      <p>Symbols marked with ${FALLBACK_MARKER} started trading after the preferred reference date and use their actual launch date.</p>
    </div>`;
}

const HEADERS: readonly [string, "string" | "number"][] = [
  ["Symbol", "string"],
  ["Initial Price (USD)", "number"],
  ["Shares Purchased", "number"],
  ["Current Price (USD)", "number"],
  ["Current Value (USD)", "number"],
  ["Dividends Collected (USD)", "number"],
  ["Gain/Loss (USD)", "number"],
  ["Gain/Loss (%)", "number"],
  ["Total Return (USD)", "number"],
  ["Total Return (%)", "number"],
  ["Status", "string"],
];

const STYLE = `
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; margin: 40px; background: #f5f5f5; }
    .container { background: white; padding: 30px; border-radius: 10px; box-shadow: 0 4px 6px rgba(0,0,0,0.1); max-width: 1400px; margin: 0 auto; overflow-x: auto; }
    h1 { color: #2c3e50; text-align: center; border-bottom: 3px solid #3498db; padding-bottom: 20px; }
    h2 { color: #2c3e50; margin-top: 30px; }
    .info { background: #ecf0f1; padding: 15px; border-radius: 5px; text-align: center; color: #34495e; }
    table { width: 100%; border-collapse: collapse; margin-top: 20px; font-size: 13px; }
    th { background: #3498db; color: white; padding: 10px 8px; cursor: pointer; user-select: none; }
    th:hover { background: #2980b9; }
    th.sort-asc::after { content: ' ↑'; }
    th.sort-desc::after { content: ' ↓'; }
    td { padding: 8px 6px; border-bottom: 1px solid #ddd; text-align: center; }
    .gain, .positive { color: #27ae60; font-weight: bold; }
    .loss, .negative { color: #e74c3c; font-weight: bold; }
    tr.fallback { background: #ffebee; }
    .summary { background: #f8f9fa; padding: 20px; border-radius: 8px; margin-top: 30px; border-left: 4px solid #3498db; }
    .summary-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 15px; }
    .summary-item { background: white; padding: 15px; border-radius: 5px; text-align: center; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    .summary-value { font-size: 1.2em; font-weight: bold; color: #2c3e50; }
    .summary-label { font-size: 0.9em; color: #7f8c8d; margin-top: 5px; }
    .failed h2 { color: #e74c3c; }
    .notes { margin-top: 30px; padding: 20px; background: #f8f9fa; border-radius: 8px; border-left: 4px solid #17a2b8; }`;

const SORT_SCRIPT = `
    document.querySelectorAll('table.sortable').forEach(function (table) {
      table.querySelectorAll('th').forEach(function (th, index) {
        th.addEventListener('click', function () {
          var ascending = !th.classList.contains('sort-asc');
          table.querySelectorAll('th').forEach(function (h) { h.classList.remove('sort-asc', 'sort-desc'); });
          th.classList.add(ascending ? 'sort-asc' : 'sort-desc');
          var numeric = th.dataset.type === 'number';
          var body = table.tBodies[0];
          var rows = Array.prototype.slice.call(body.rows);
          rows.sort(function (a, b) {
            var x = a.cells[index].dataset.sort || a.cells[index].textContent;
            var y = b.cells[index].dataset.sort || b.cells[index].textContent;
            var order = numeric ? parseFloat(x) - parseFloat(y) : x.localeCompare(y);
            return ascending ? order : -order;
          });
          rows.forEach(function (row) { body.appendChild(row); });
        });
      });
    });`;

// --- Page ---

export function renderHtmlReport(input: HtmlReportInput): string {
  const { report, summary, investmentAmount, startDate, analysisDate } = input;
  const headers = HEADERS.map(([title, type]) =>
    `          <th data-type="${type}">${escapeHtml(title)}</th>`
  ).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Income Investing Analysis</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
    <h1>📊 Income Investing Portfolio Analysis</h1>
    <div class="info">
      <strong>Analysis Date:</strong> ${formatDdMmYyyy(analysisDate)} |
      <strong>Reference Date:</strong> ${formatDdMmYyyy(startDate)} |
      <strong>Investment per Symbol:</strong> ${usd(investmentAmount)}
    </div>

    <div class="summary">
      <h3>💰 Portfolio Summary</h3>
      <div class="summary-grid">${[
    summaryItem(usd(summary.initialInvestment), "Initial Investment"),
    summaryItem(usd(summary.currentValue), "Current Value"),
    summaryItem(usd(summary.dividendsCollected), "Dividends Collected"),
    summaryItem(
      usd(summary.gainLoss),
      `Price Gain/Loss (${signed(summary.gainLossPercent)}%)`,
      signClass(summary.gainLoss),
    ),
    summaryItem(
      usd(summary.totalReturn),
      `Total Return (${signed(summary.totalReturnPercent)}%)`,
      signClass(summary.totalReturn),
    ),
    summaryItem(`${summary.workingCount}/${summary.totalCount}`, "Working Symbols"),
  ].join("")}
      </div>
    </div>

    <h2>📈 Active Portfolio</h2>
    <table id="results" class="sortable">
      <thead>
        <tr>
${headers}
        </tr>
      </thead>
      <tbody>
${report.working.map(renderRow).join("\n")}
      </tbody>
    </table>
${failedTable(report.failed)}${notesSection(fallbackNotes(report.working))}
  </div>
  <script>${SORT_SCRIPT}
  </script>
</body>
</html>
`;
}

export function writeHtmlReport(
  path: string,
  html: string,
): Effect.Effect<void, PlatformError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, html);
    yield* Console.log(`HTML Report Generated: ${path}`);
  });
}
