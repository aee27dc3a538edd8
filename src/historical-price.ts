// Opening price on, or soon after, a preferred date.

import { Console, Effect, Option } from "effect";
import type { HistoricalQuote, PriceBar, TickerVariant } from "./domain.ts";
import { addDays, today } from "./dates.ts";
import {
  type ProviderError,
  QuoteProvider,
  type ResolutionFailure,
} from "./quote-provider.ts";
import { expandTickerVariants } from "./ticker-variants.ts";
import { firstSuccessfulVariant } from "./variant-fallback.ts";

/** Days after the preferred date searched for its own trading session. */
export const PREFERRED_WINDOW_DAYS = 5;

/** How far before the preferred date the earliest-available search starts. */
export const LOOKBACK_DAYS = 90;

export function firstUsableBar(
  bars: readonly PriceBar[],
): Option.Option<PriceBar> {
  return Option.fromNullable(
    bars.find((bar) => Number.isFinite(bar.open) && bar.open > 0),
  );
}

function attemptVariant(
  variant: TickerVariant,
  preferredDate: string,
): Effect.Effect<Option.Option<HistoricalQuote>, ProviderError, QuoteProvider> {
  return Effect.gen(function* () {
    const provider = yield* QuoteProvider;

    const near = yield* provider.fetchHistory(
      variant,
      preferredDate,
      addDays(preferredDate, PREFERRED_WINDOW_DAYS),
    );
    const nearBar = firstUsableBar(near);
    if (Option.isSome(nearBar)) {
      const bar = nearBar.value;
      return Option.some<HistoricalQuote>({
        price: bar.open,
        asOfDate: bar.date,
        variant,
        method: "HistoryPreferredDate",
        isFallbackDate: bar.date !== preferredDate,
      });
    }

    // Nothing around the preferred date: the fund probably launched later.
    const end = addDays(yield* today, 1);
    const wide = yield* provider.fetchHistory(
      variant,
      addDays(preferredDate, -LOOKBACK_DAYS),
      end,
    );
    return firstUsableBar(wide).pipe(
      Option.map((bar): HistoricalQuote => ({
        price: bar.open,
        asOfDate: bar.date,
        variant,
        method: "HistoryEarliestAvailable",
        isFallbackDate: true,
      })),
    );
  });
}

export function resolveHistoricalPrice(
  symbol: string,
  preferredDate: string,
): Effect.Effect<HistoricalQuote, ResolutionFailure, QuoteProvider> {
  return Effect.gen(function* () {
    const provider = yield* QuoteProvider;
    const quote = yield* firstSuccessfulVariant(
      "history",
      symbol,
      expandTickerVariants(symbol),
      (variant) =>
        attemptVariant(variant, preferredDate).pipe(
          Effect.provideService(QuoteProvider, provider),
        ),
    );

    yield* Console.log(
      `  ✓ ${quote.variant.ticker} opened at $${quote.price.toFixed(2)} on ${quote.asOfDate}` +
        (quote.isFallbackDate ? " (fallback date)" : ""),
    );
    return quote;
  });
}
