// Cross-validation, used when the historical resolver finds nothing.
//
// Two independent lookups per variant; prices agree when every one of them
// is within 1% of their mean. The verifier reports a price, never a date.

import { Array as Arr, Console, Effect, Option } from "effect";
import type {
  MethodUsed,
  PriceBar,
  PriceMethod,
  TickerVariant,
  VerificationOutcome,
  VerificationStatus,
} from "./domain.ts";
import { addDays, daysBetween } from "./dates.ts";
import { firstUsableBar } from "./historical-price.ts";
import {
  describeProviderError,
  type ProviderError,
  QuoteProvider,
  type QuoteProviderService,
} from "./quote-provider.ts";
import {
  expandTickerVariants,
  VERIFICATION_GROUPS,
} from "./ticker-variants.ts";
import { firstSuccessfulVariant } from "./variant-fallback.ts";

export const MAX_RELATIVE_DEVIATION = 0.01;

export interface PriceSample extends MethodUsed {
  readonly price: number;
}

// --- Classification ---

export function classifySamples(
  samples: readonly PriceSample[],
): VerificationOutcome {
  const methodsUsed = samples.map(({ method, ticker }) => ({ method, ticker }));
  const individualPrices = samples.map((s) => s.price);

  if (individualPrices.length === 0) {
    return {
      averagePrice: undefined,
      verified: false,
      methodsUsed,
      individualPrices,
      maxRelativeDeviation: undefined,
      error: "All verification methods failed",
    };
  }

  if (individualPrices.length === 1) {
    return {
      averagePrice: individualPrices[0],
      verified: false,
      methodsUsed,
      individualPrices,
      maxRelativeDeviation: undefined,
      error: undefined,
    };
  }

  const average = individualPrices.reduce((sum, p) => sum + p, 0) /
    individualPrices.length;
  const maxRelativeDeviation = Math.max(
    ...individualPrices.map((p) => Math.abs(p - average) / average),
  );

  return {
    averagePrice: average,
    verified: maxRelativeDeviation <= MAX_RELATIVE_DEVIATION,
    methodsUsed,
    individualPrices,
    maxRelativeDeviation,
    error: undefined,
  };
}

export function verificationStatus(
  outcome: VerificationOutcome,
): VerificationStatus {
  if (outcome.verified) return "Verified";
  return outcome.averagePrice !== undefined ? "AlternateSource" : "NoData";
}

// --- Retrieval methods ---

/** Usable bar closest to `target`; the earlier bar wins a tie. */
export function nearestBar(
  bars: readonly PriceBar[],
  target: string,
): Option.Option<PriceBar> {
  let best: PriceBar | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const bar of bars) {
    if (!Number.isFinite(bar.open) || bar.open <= 0) continue;
    const distance = daysBetween(bar.date, target);
    if (distance < bestDistance) {
      best = bar;
      bestDistance = distance;
    }
  }
  return Option.fromNullable(best);
}

function sampleWith(
  method: PriceMethod,
  variant: TickerVariant,
  lookup: Effect.Effect<Option.Option<PriceBar>, ProviderError>,
): Effect.Effect<Option.Option<PriceSample>> {
  return lookup.pipe(
    Effect.map(Option.map((bar: PriceBar): PriceSample => ({
      method,
      ticker: variant.ticker,
      price: bar.open,
    }))),
    Effect.tap(Option.match({
      onNone: () => Effect.logDebug(`[verify] ${method} (${variant.ticker}): no data`),
      onSome: (s: PriceSample) =>
        Effect.logDebug(`[verify] ${method} (${variant.ticker}): $${s.price.toFixed(2)}`),
    })),
    Effect.catchAll((e) =>
      Effect.logDebug(
        `[verify] ${method} (${variant.ticker}) failed: ${describeProviderError(e)}`,
      ).pipe(Effect.as(Option.none()))
    ),
  );
}

function sampleVariant(
  provider: QuoteProviderService,
  variant: TickerVariant,
  targetDate: string,
): Effect.Effect<Option.Option<readonly PriceSample[]>> {
  const anchored = sampleWith(
    "HistoryPreferredDate",
    variant,
    provider.fetchHistory(variant, targetDate, addDays(targetDate, 5)).pipe(
      Effect.map(firstUsableBar),
    ),
  );
  const ranged = sampleWith(
    "DownloadRangeNearest",
    variant,
    provider.fetchHistory(variant, addDays(targetDate, -2), addDays(targetDate, 4))
      .pipe(Effect.map((bars) => nearestBar(bars, targetDate))),
  );

  return Effect.all([anchored, ranged]).pipe(
    Effect.map((results) => {
      const samples = Arr.getSomes(results);
      return samples.length > 0 ? Option.some(samples) : Option.none();
    }),
  );
}

// --- Verifier ---

export function verifyHistoricalPrice(
  symbol: string,
  targetDate: string,
): Effect.Effect<VerificationOutcome, never, QuoteProvider> {
  return Effect.gen(function* () {
    const provider = yield* QuoteProvider;
    yield* Console.log("  🔍 Trying alternative verification methods...");

    const samples = yield* firstSuccessfulVariant(
      "verify",
      symbol,
      expandTickerVariants(symbol, { groups: VERIFICATION_GROUPS }),
      (variant) => sampleVariant(provider, variant, targetDate),
    ).pipe(
      Effect.catchTag("ResolutionFailure", () =>
        Effect.succeed<readonly PriceSample[]>([])),
    );

    const outcome = classifySamples(samples);
    yield* logOutcome(outcome);
    return outcome;
  });
}

function logOutcome(outcome: VerificationOutcome): Effect.Effect<void> {
  const { averagePrice, individualPrices, maxRelativeDeviation } = outcome;
  if (averagePrice === undefined) {
    return Console.log("  ❌ All verification methods failed");
  }
  if (individualPrices.length === 1) {
    return Console.log(`  ⚠️ Only 1 method succeeded: $${averagePrice.toFixed(2)}`);
  }
  if (outcome.verified) {
    return Console.log(
      `  ✅ ${individualPrices.length} methods agree: $${averagePrice.toFixed(2)}`,
    );
  }
  return Console.log(
    `  ⚠️ Price discrepancy detected (max diff: ${((maxRelativeDeviation ?? 0) * 100).toFixed(1)}%): ` +
      individualPrices.map((p) => `$${p.toFixed(2)}`).join(", "),
  );
}
