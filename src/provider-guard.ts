// Wraps each QuoteProvider call with a timeout and network retries, drawing
// on one rate limiter shared by all calls.

import { Duration, Effect, type RateLimiter, Schedule } from "effect";
import {
  NetworkError,
  type ProviderError,
  type QuoteProviderService,
} from "./quote-provider.ts";

export interface GuardOptions {
  readonly name: string;
  readonly timeout: Duration.DurationInput;
  readonly retries: number;
  readonly retryDelay: Duration.DurationInput;
  /** Shared by every call, so concurrent symbols draw from one budget. */
  readonly limiter: RateLimiter.RateLimiter;
}

export function isRetryable(e: ProviderError): boolean {
  return e._tag === "NetworkError";
}

function guarded<A>(
  options: GuardOptions,
  label: string,
  call: Effect.Effect<A, ProviderError>,
): Effect.Effect<A, ProviderError> {
  const attempt = options.limiter(
    call.pipe(
      Effect.timeoutFail({
        duration: options.timeout,
        onTimeout: () =>
          new NetworkError({
            message: `${options.name}: ${label} timed out after ${Duration.format(Duration.decode(options.timeout))}`,
          }),
      }),
    ),
  );

  return attempt.pipe(
    Effect.tapError((e) =>
      isRetryable(e)
        ? Effect.logDebug(`[guard] ${label}: ${e._tag}, may retry`)
        : Effect.void
    ),
    Effect.retry({
      while: isRetryable,
      schedule: Schedule.exponential(options.retryDelay).pipe(
        Schedule.compose(Schedule.recurs(options.retries)),
      ),
    }),
  );
}

export function guardQuoteProvider(
  provider: QuoteProviderService,
  options: GuardOptions,
): QuoteProviderService {
  return {
    fetchHistory: (variant, start, end) =>
      guarded(
        options,
        `history ${variant.ticker}`,
        provider.fetchHistory(variant, start, end),
      ),
    fetchRecent: (variant, lookbackDays) =>
      guarded(
        options,
        `recent ${variant.ticker}`,
        provider.fetchRecent(variant, lookbackDays),
      ),
    fetchDividends: (variant) =>
      guarded(options, `dividends ${variant.ticker}`, provider.fetchDividends(variant)),
    fetchQuoteSnapshot: (variant) =>
      guarded(options, `snapshot ${variant.ticker}`, provider.fetchQuoteSnapshot(variant)),
  };
}
