// In-memory QuoteProvider for tests and offline runs (QUOTE_PROVIDER=test).

import { Effect, Layer } from "effect";
import type { DividendEvent, PriceBar, TickerVariant } from "../domain.ts";
import {
  type ProviderError,
  QuoteProvider,
  type QuoteProviderService,
  SymbolNotFound,
} from "../quote-provider.ts";

export type ProviderCall = "history" | "recent" | "dividends" | "snapshot";

export interface TickerFixture {
  readonly bars?: readonly PriceBar[];
  readonly dividends?: readonly DividendEvent[];
  readonly snapshotPrice?: number;
  /** Fails the listed calls for this ticker. */
  readonly failing?: Partial<Record<ProviderCall, ProviderError>>;
}

export type Fixtures = Readonly<Record<string, TickerFixture>>;

export function makeInMemoryQuoteProvider(
  fixtures: Fixtures,
): QuoteProviderService {
  const lookup = (
    variant: TickerVariant,
    call: ProviderCall,
  ): Effect.Effect<TickerFixture, ProviderError> => {
    const fixture = fixtures[variant.ticker];
    if (fixture === undefined) {
      return Effect.fail(new SymbolNotFound({ symbol: variant.ticker }));
    }
    const failure = fixture.failing?.[call];
    return failure === undefined ? Effect.succeed(fixture) : Effect.fail(failure);
  };

  return {
    fetchHistory: (variant, start, end) =>
      lookup(variant, "history").pipe(
        Effect.map((f) =>
          (f.bars ?? []).filter((bar) => bar.date >= start && bar.date < end)
        ),
      ),
    fetchRecent: (variant, lookbackDays) =>
      lookup(variant, "recent").pipe(
        Effect.map((f) => (f.bars ?? []).slice(-lookbackDays)),
      ),
    fetchDividends: (variant) =>
      lookup(variant, "dividends").pipe(Effect.map((f) => f.dividends ?? [])),
    fetchQuoteSnapshot: (variant) =>
      lookup(variant, "snapshot").pipe(
        Effect.map((f) => ({ regularMarketPrice: f.snapshotPrice })),
      ),
  };
}

export const inMemoryQuoteProviderLayer = (fixtures: Fixtures) =>
  Layer.succeed(QuoteProvider, makeInMemoryQuoteProvider(fixtures));

// --- Sample data ---

const bar = (date: string, open: number, close: number): PriceBar => ({
  date,
  open,
  close,
});

export const sampleFixtures: Fixtures = {
  // Listed throughout the period, pays monthly.
  INCM: {
    bars: [
      bar("2025-01-02", 20.0, 20.1),
      bar("2025-01-03", 20.1, 20.3),
      bar("2025-06-13", 21.4, 21.5),
      bar("2025-06-16", 21.5, 21.6),
    ],
    dividends: [
      { exDate: "2024-12-16", amount: 0.15 },
      { exDate: "2025-01-15", amount: 0.15 },
      { exDate: "2025-02-14", amount: 0.15 },
      { exDate: "2025-03-14", amount: 0.15 },
    ],
  },
  // Launched after the reference date.
  NEWF: {
    bars: [
      bar("2025-03-05", 25.0, 24.8),
      bar("2025-03-06", 24.8, 24.9),
      bar("2025-06-16", 23.9, 24.0),
    ],
    dividends: [{ exDate: "2025-04-10", amount: 0.2 }],
  },
  // Only the Toronto listing has data.
  "MAPL.TO": {
    bars: [
      bar("2025-01-02", 12.0, 12.2),
      bar("2025-06-16", 12.9, 13.0),
    ],
  },
};
