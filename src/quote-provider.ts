// Quote provider — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type {
  DividendEvent,
  PriceBar,
  QuoteSnapshot,
  TickerVariant,
} from "./domain.ts";

// --- Provider errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export type ProviderError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound;

/** One-line description of a provider error for logs and report notes. */
export function describeProviderError(error: ProviderError): string {
  switch (error._tag) {
    case "NetworkError":
    case "ParseError":
      return error.message;
    case "HttpError":
      return `HTTP ${error.status}`;
    case "SymbolNotFound":
      return `Symbol not found: ${error.symbol}`;
  }
}

// --- Resolution failure ---

/** Every variant (and method) of one resolution step came back empty. */
export class ResolutionFailure extends Data.TaggedError("ResolutionFailure")<{
  readonly symbol: string;
  readonly message: string;
}> {}

// --- Service ---

export interface QuoteProviderService {
  /** Daily bars with `start <= date < end`, oldest first. */
  readonly fetchHistory: (
    variant: TickerVariant,
    start: string,
    end: string,
  ) => Effect.Effect<readonly PriceBar[], ProviderError>;

  /** The most recent trading days, oldest first. */
  readonly fetchRecent: (
    variant: TickerVariant,
    lookbackDays: number,
  ) => Effect.Effect<readonly PriceBar[], ProviderError>;

  /** Full dividend history, oldest first. */
  readonly fetchDividends: (
    variant: TickerVariant,
  ) => Effect.Effect<readonly DividendEvent[], ProviderError>;

  readonly fetchQuoteSnapshot: (
    variant: TickerVariant,
  ) => Effect.Effect<QuoteSnapshot, ProviderError>;
}

export class QuoteProvider extends Context.Tag("QuoteProvider")<
  QuoteProvider,
  QuoteProviderService
>() {}
