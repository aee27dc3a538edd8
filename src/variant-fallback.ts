// Variant fallback — tries ticker variants in order, first success wins.

import { Effect, Option } from "effect";
import type { TickerVariant } from "./domain.ts";
import {
  describeProviderError,
  type ProviderError,
  ResolutionFailure,
} from "./quote-provider.ts";

/** One attempt against one variant. `None` means "no data here", which
 *  moves on to the next variant just like a provider error does. */
export type VariantAttempt<A> = (
  variant: TickerVariant,
) => Effect.Effect<Option.Option<A>, ProviderError>;

export function firstSuccessfulVariant<A>(
  label: string,
  symbol: string,
  variants: readonly TickerVariant[],
  attempt: VariantAttempt<A>,
): Effect.Effect<A, ResolutionFailure> {
  const loop = (
    index: number,
    lastError: ProviderError | undefined,
  ): Effect.Effect<A, ResolutionFailure> => {
    if (index >= variants.length) {
      return Effect.fail(
        new ResolutionFailure({
          symbol,
          message: lastError === undefined
            ? "No data available"
            : describeProviderError(lastError),
        }),
      );
    }

    const current = variants[index];

    return Effect.logDebug(`[${label}] trying ${current.ticker}...`).pipe(
      Effect.flatMap(() => attempt(current)),
      Effect.matchEffect({
        onFailure: (e) =>
          Effect.logDebug(
            `[${label}] ${current.ticker} failed: ${describeProviderError(e)}`,
          ).pipe(Effect.zipRight(loop(index + 1, e))),
        onSuccess: Option.match({
          onNone: () =>
            Effect.logDebug(`[${label}] ${current.ticker}: no data`).pipe(
              Effect.zipRight(loop(index + 1, lastError)),
            ),
          onSome: (value: A) => Effect.succeed(value),
        }),
      }),
    );
  };

  return loop(0, undefined);
}
