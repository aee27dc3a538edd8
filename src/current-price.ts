// Current price: latest close, else the market snapshot price.

import { Console, Effect, Option } from "effect";
import type { PriceQuote, TickerVariant } from "./domain.ts";
import {
  type ProviderError,
  QuoteProvider,
  type ResolutionFailure,
} from "./quote-provider.ts";
import { expandTickerVariants } from "./ticker-variants.ts";
import { firstSuccessfulVariant } from "./variant-fallback.ts";

export const RECENT_TRADING_DAYS = 5;

function attemptVariant(
  variant: TickerVariant,
): Effect.Effect<Option.Option<PriceQuote>, ProviderError, QuoteProvider> {
  return Effect.gen(function* () {
    const provider = yield* QuoteProvider;

    const recent = yield* provider.fetchRecent(variant, RECENT_TRADING_DAYS);
    const last = recent.at(-1);
    if (last !== undefined && Number.isFinite(last.close) && last.close > 0) {
      return Option.some<PriceQuote>({
        price: last.close,
        asOfDate: last.date,
        variant,
        method: "RecentClose",
      });
    }

    const snapshot = yield* provider.fetchQuoteSnapshot(variant);
    const price = snapshot.regularMarketPrice;
    if (price === undefined || !Number.isFinite(price) || price === 0) {
      return Option.none();
    }
    return Option.some<PriceQuote>({
      price,
      asOfDate: undefined,
      variant,
      method: "MarketSnapshot",
    });
  });
}

export function resolveCurrentPrice(
  symbol: string,
): Effect.Effect<PriceQuote, ResolutionFailure, QuoteProvider> {
  return Effect.gen(function* () {
    const provider = yield* QuoteProvider;
    const quote = yield* firstSuccessfulVariant(
      "current",
      symbol,
      expandTickerVariants(symbol),
      (variant) =>
        attemptVariant(variant).pipe(
          Effect.provideService(QuoteProvider, provider),
        ),
    );

    yield* Console.log(
      `  ✓ Current price${quote.asOfDate === undefined ? " (snapshot)" : ` (${quote.asOfDate})`}: $${quote.price.toFixed(2)}`,
    );
    return quote;
  });
}
