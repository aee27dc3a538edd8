// One analysis run: configuration -> batch -> console output -> HTML file.

import type { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import {
  type ConfigError,
  Console,
  Effect,
  Option,
  type ParseResult,
} from "effect";
import type { BatchReport } from "./domain.ts";
import { AnalysisConfig, resolveSymbols } from "./config.ts";
import { today } from "./dates.ts";
import { runBatch } from "./batch.ts";
import {
  formatBanner,
  formatFailedList,
  formatPortfolioSummary,
  formatVerificationSummary,
  formatWorkingTable,
} from "./format.ts";
import { renderHtmlReport, writeHtmlReport } from "./html-report.ts";
import type { QuoteProvider } from "./quote-provider.ts";
import { summarizePortfolio } from "./summary.ts";

export interface AnalysisOptions {
  readonly outputPath: string;
}

export function runAnalysis(
  options: AnalysisOptions,
): Effect.Effect<
  BatchReport,
  ConfigError.ConfigError | PlatformError | ParseResult.ParseError,
  QuoteProvider | FileSystem.FileSystem | Path.Path
> {
  return Effect.gen(function* () {
    const config = yield* AnalysisConfig;
    const symbols = yield* resolveSymbols(config.symbols);
    const analysisDate = yield* today;
    const endDate = Option.getOrElse(config.endDate, () => analysisDate);

    yield* Console.log(formatBanner(config.startDate, config.investmentAmount));

    const report = yield* runBatch(symbols, {
      startDate: config.startDate,
      endDate,
      investmentAmount: config.investmentAmount,
      concurrency: config.concurrency,
    });
    const summary = summarizePortfolio(
      report.working,
      report.failed.length,
      config.investmentAmount,
    );

    if (report.working.length > 0) {
      yield* Console.log(`\n${formatWorkingTable(report.working)}`);
    }
    if (report.failed.length > 0) {
      yield* Console.log(`\n${formatFailedList(report.failed)}`);
    }
    yield* Console.log(`\n${formatVerificationSummary(report.verification)}`);
    if (report.working.length > 0) {
      yield* Console.log(`\n${formatPortfolioSummary(summary)}`);
    }

    yield* writeHtmlReport(
      options.outputPath,
      renderHtmlReport({
        report,
        summary,
        investmentAmount: config.investmentAmount,
        startDate: config.startDate,
        analysisDate,
      }),
    );
    yield* Console.log(`Total symbols analysed: ${symbols.length}`);
    return report;
  });
}
