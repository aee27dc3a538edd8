// Batch orchestrator — every configured symbol to one record, in order.

import { Console, Effect } from "effect";
import type {
  BatchReport,
  PortfolioRecord,
  PriceCheck,
  VerificationStatus,
  VerificationSummary,
} from "./domain.ts";
import {
  buildPortfolioRecord,
  degradedRecord,
  failedRecord,
} from "./portfolio-record.ts";
import type { QuoteProvider, ResolutionFailure } from "./quote-provider.ts";
import { verifyHistoricalPrice } from "./verification.ts";

export interface BatchOptions {
  readonly startDate: string;
  readonly endDate: string;
  readonly investmentAmount: number;
  readonly concurrency: number;
}

export interface SymbolResult {
  readonly record: PortfolioRecord;
  readonly check: PriceCheck;
}

const NO_DATA_ANYWHERE = "No data available from any source";
const ALTERNATE_SOURCE = "Alternative source used";

const FAILED_STATUSES: ReadonlySet<VerificationStatus> = new Set([
  "NoData",
  "Error",
]);

export function isWorking(record: PortfolioRecord): boolean {
  return !FAILED_STATUSES.has(record.status);
}

// --- Per symbol ---

function verifiedResult(record: PortfolioRecord): SymbolResult {
  return {
    record,
    check: {
      symbol: record.symbol,
      price: record.initialPrice,
      verified: true,
      reason: undefined,
    },
  };
}

function fallbackResult(
  symbol: string,
  options: BatchOptions,
  failure: ResolutionFailure,
): Effect.Effect<SymbolResult, never, QuoteProvider> {
  return Effect.gen(function* () {
    yield* Console.log(
      `  ❌ No data from primary source (${failure.message}), trying alternative...`,
    );
    const outcome = yield* verifyHistoricalPrice(symbol, options.startDate);

    if (outcome.averagePrice === undefined) {
      yield* Console.log(`  🔴 FAILED: ${NO_DATA_ANYWHERE}`);
      return {
        record: failedRecord(symbol, "NoData", NO_DATA_ANYWHERE),
        check: { symbol, price: 0, verified: false, reason: NO_DATA_ANYWHERE },
      };
    }

    const record = degradedRecord(symbol, options.investmentAmount, outcome);
    yield* Console.log(`  ${record.status}: $${record.initialPrice.toFixed(2)}`);
    return {
      record,
      check: {
        symbol,
        price: record.initialPrice,
        verified: outcome.verified,
        reason: outcome.verified ? undefined : outcome.error ?? ALTERNATE_SOURCE,
      },
    };
  });
}

function errorResult(symbol: string, defect: unknown): SymbolResult {
  const message = defect instanceof Error ? defect.message : String(defect);
  return {
    record: failedRecord(symbol, "Error", message),
    check: { symbol, price: 0, verified: false, reason: message },
  };
}

/** Never fails: every outcome, including a defect, becomes a record. */
export function processSymbol(
  symbol: string,
  options: BatchOptions,
): Effect.Effect<SymbolResult, never, QuoteProvider> {
  return buildPortfolioRecord(
    symbol,
    options.startDate,
    options.endDate,
    options.investmentAmount,
  ).pipe(
    Effect.map(verifiedResult),
    Effect.catchTag("ResolutionFailure", (failure) =>
      fallbackResult(symbol, options, failure)),
    Effect.catchAllDefect((defect) =>
      Console.error(`  ❌ Unexpected error processing ${symbol}: ${String(defect)}`).pipe(
        Effect.as(errorResult(symbol, defect)),
      )
    ),
  );
}

// --- Batch ---

export function summarizeVerification(
  checks: readonly PriceCheck[],
): VerificationSummary {
  return {
    verifiedCount: checks.filter((c) => c.verified).length,
    total: checks.length,
    unverified: checks.filter((c) => !c.verified),
  };
}

export function runBatch(
  symbols: readonly string[],
  options: BatchOptions,
): Effect.Effect<BatchReport, never, QuoteProvider> {
  return Effect.forEach(
    symbols,
    (symbol) => processSymbol(symbol, options),
    { concurrency: Math.max(1, options.concurrency) },
  ).pipe(
    Effect.map((results) => {
      const records = results.map((r) => r.record);
      return {
        records,
        working: records.filter(isWorking),
        failed: records.filter((r) => !isWorking(r)),
        verification: summarizeVerification(results.map((r) => r.check)),
      };
    }),
  );
}
