// Run configuration, read from the environment through Effect's Config.
// The default symbol list lives in data/income-symbols.json.

import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import {
  Config,
  Duration,
  Effect,
  LogLevel,
  Option,
  type ParseResult,
  Schema,
} from "effect";
import { isIsoDate } from "./dates.ts";

// --- Analysis settings ---

const isoDate = (name: string) =>
  Config.string(name).pipe(
    Config.validate({
      message: `${name} must be a calendar date in YYYY-MM-DD form`,
      validation: isIsoDate,
    }),
  );

export const DEFAULT_START_DATE = "2025-01-02";
export const DEFAULT_INVESTMENT = 10_000;

export const AnalysisConfig = Config.all({
  symbols: Config.option(Config.array(Config.string(), "SYMBOLS")),
  investmentAmount: Config.number("INVESTMENT_AMOUNT").pipe(
    Config.validate({
      message: "INVESTMENT_AMOUNT must be a positive number",
      validation: (n: number) => n > 0,
    }),
    Config.withDefault(DEFAULT_INVESTMENT),
  ),
  startDate: isoDate("START_DATE").pipe(Config.withDefault(DEFAULT_START_DATE)),
  endDate: Config.option(isoDate("END_DATE")),
  concurrency: Config.integer("CONCURRENCY").pipe(
    Config.validate({
      message: "CONCURRENCY must be at least 1",
      validation: (n: number) => n >= 1,
    }),
    Config.withDefault(1),
  ),
});

// --- Provider settings ---
// Set QUOTE_PROVIDER to "yahoo" (default) or "test" (built-in sample data).

export const ProviderConfig = Config.all({
  provider: Config.literal("yahoo", "test")("QUOTE_PROVIDER").pipe(
    Config.withDefault("yahoo" as const),
  ),
  requestsPerSecond: Config.integer("REQUESTS_PER_SECOND").pipe(
    Config.validate({
      message: "REQUESTS_PER_SECOND must be at least 1",
      validation: (n: number) => n >= 1,
    }),
    Config.withDefault(5),
  ),
  timeout: Config.duration("PROVIDER_TIMEOUT").pipe(
    Config.withDefault(Duration.seconds(10)),
  ),
});

// Per-variant diagnostics are logged at Debug; LOG_LEVEL=Debug shows them.
export const LogLevelConfig = Config.logLevel("LOG_LEVEL").pipe(
  Config.withDefault(LogLevel.Info),
);

// --- Symbols ---

const SymbolsFile = Schema.Struct({ symbols: Schema.Array(Schema.String) });

/** Trimmed, upper-cased, empty entries and repeats removed, order kept. */
export function normalizeSymbols(raw: readonly string[]): readonly string[] {
  const seen = new Set<string>();
  const symbols: string[] = [];
  for (const entry of raw) {
    const symbol = entry.trim().toUpperCase();
    if (symbol === "" || seen.has(symbol)) continue;
    seen.add(symbol);
    symbols.push(symbol);
  }
  return symbols;
}

export const loadDefaultSymbols: Effect.Effect<
  readonly string[],
  PlatformError | ParseResult.ParseError,
  FileSystem.FileSystem | Path.Path
> = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;
  const file = yield* path.fromFileUrl(
    new URL("../data/income-symbols.json", import.meta.url),
  );
  const text = yield* fs.readFileString(file);
  const { symbols } = yield* Schema.decodeUnknown(Schema.parseJson(SymbolsFile))(text);
  return symbols;
});

export function resolveSymbols(
  configured: Option.Option<readonly string[]>,
): Effect.Effect<
  readonly string[],
  PlatformError | ParseResult.ParseError,
  FileSystem.FileSystem | Path.Path
> {
  return Option.match(configured, {
    onNone: () => loadDefaultSymbols,
    onSome: (symbols) => Effect.succeed(symbols),
  }).pipe(Effect.map(normalizeSymbols));
}
