// Dividends collected over a holding period.
//
// "No history anywhere" and "no payments in the window" both come back as
// zero. Callers cannot tell the two apart.

import { Console, Effect, Option } from "effect";
import type { DividendCollection, DividendEvent } from "./domain.ts";
import { QuoteProvider } from "./quote-provider.ts";
import { expandTickerVariants } from "./ticker-variants.ts";
import { firstSuccessfulVariant } from "./variant-fallback.ts";

export const NO_DIVIDENDS: DividendCollection = {
  totalCollected: 0,
  paymentCount: 0,
  perShareTotal: 0,
};

/** Events with `periodStart <= exDate <= periodEnd`. */
export function dividendsInPeriod(
  events: readonly DividendEvent[],
  periodStart: string,
  periodEnd: string,
): readonly DividendEvent[] {
  return events.filter((e) => e.exDate >= periodStart && e.exDate <= periodEnd);
}

export function sumDividends(
  events: readonly DividendEvent[],
  sharesOwned: number,
): DividendCollection {
  if (events.length === 0) return NO_DIVIDENDS;
  const perShareTotal = events.reduce((sum, e) => sum + e.amount, 0);
  return {
    totalCollected: perShareTotal * sharesOwned,
    paymentCount: events.length,
    perShareTotal,
  };
}

export function collectDividends(
  symbol: string,
  periodStart: string,
  periodEnd: string,
  sharesOwned: number,
): Effect.Effect<DividendCollection, never, QuoteProvider> {
  return Effect.gen(function* () {
    const provider = yield* QuoteProvider;

    const history = yield* firstSuccessfulVariant(
      "dividends",
      symbol,
      expandTickerVariants(symbol),
      (variant) =>
        provider.fetchDividends(variant).pipe(
          Effect.map((events) =>
            events.length > 0 ? Option.some(events) : Option.none()
          ),
        ),
    ).pipe(
      Effect.catchTag("ResolutionFailure", () =>
        Console.log("  ✓ No dividends found").pipe(
          Effect.as<readonly DividendEvent[]>([]),
        )),
    );

    if (history.length === 0) return NO_DIVIDENDS;

    const collection = sumDividends(
      dividendsInPeriod(history, periodStart, periodEnd),
      sharesOwned,
    );

    yield* collection.paymentCount === 0
      ? Console.log("  ✓ No dividends in period")
      : Console.log(
        `  ✓ Dividends: ${collection.paymentCount} payments, $${collection.totalCollected.toFixed(2)} total`,
      );
    return collection;
  });
}
