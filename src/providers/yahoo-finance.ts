// Yahoo Finance — implementation of QuoteProvider over the v8 chart API.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { type ConfigError, Config, Effect, Option, Schema } from "effect";
import type {
  DividendEvent,
  PriceBar,
  QuoteSnapshot,
  TickerVariant,
} from "../domain.ts";
import { exchangeDate, toEpochMs } from "../dates.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  type ProviderError,
  type QuoteProviderService,
  SymbolNotFound,
} from "../quote-provider.ts";

// --- Yahoo response schema ---

const NullableNumbers = Schema.Array(Schema.NullOr(Schema.Number));

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Number),
  gmtoffset: Schema.optional(Schema.Number),
});

const YahooDividend = Schema.Struct({
  amount: Schema.Number,
  date: Schema.Number,
});

const YahooChartResult = Schema.Struct({
  meta: YahooMeta,
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(
    Schema.Struct({
      quote: Schema.optional(
        Schema.Array(
          Schema.Struct({
            open: Schema.optional(NullableNumbers),
            close: Schema.optional(NullableNumbers),
          }),
        ),
      ),
    }),
  ),
  events: Schema.optional(
    Schema.Struct({
      dividends: Schema.optional(
        Schema.Record({ key: Schema.String, value: YahooDividend }),
      ),
    }),
  ),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooChartResult)),
    error: Schema.NullOr(
      Schema.Struct({
        code: Schema.optional(Schema.String),
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResultType = typeof YahooChartResult.Type;

// Yahoo answers a range before the listing date with an error instead of an
// empty series.
const NO_DATA_IN_RANGE = /data doesn't exist/i;

// --- Decoding ---

function decodeChart(
  json: unknown,
  ticker: string,
  allowEmptyRange: boolean,
): Effect.Effect<YahooChartResultType | undefined, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({ message: `Invalid response: ${schemaError.message}` }),
    ),
    Effect.flatMap(({ chart }) => {
      if (chart.error !== null) {
        return allowEmptyRange &&
            NO_DATA_IN_RANGE.test(chart.error.description ?? "")
          ? Effect.succeed(undefined)
          : Effect.fail(new SymbolNotFound({ symbol: ticker }));
      }
      if (chart.result === null || chart.result.length === 0) {
        return Effect.fail(new SymbolNotFound({ symbol: ticker }));
      }
      return Effect.succeed(chart.result[0]);
    }),
  );
}

function toBars(result: YahooChartResultType): readonly PriceBar[] {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators?.quote?.[0];
  const offset = result.meta.gmtoffset ?? 0;
  const bars: PriceBar[] = [];

  timestamps.forEach((ts, i) => {
    const open = quote?.open?.[i];
    const close = quote?.close?.[i];
    if (typeof open !== "number" || typeof close !== "number") return;
    bars.push({ date: exchangeDate(ts, offset), open, close });
  });
  return bars;
}

function toDividends(result: YahooChartResultType): readonly DividendEvent[] {
  const offset = result.meta.gmtoffset ?? 0;
  return Object.values(result.events?.dividends ?? {})
    .slice()
    .sort((a, b) => a.date - b.date)
    .map((d) => ({ exDate: exchangeDate(d.date, offset), amount: d.amount }));
}

export function decodeYahooBars(
  json: unknown,
  ticker: string,
): Effect.Effect<readonly PriceBar[], ParseError | SymbolNotFound> {
  return decodeChart(json, ticker, true).pipe(
    Effect.map((result) => (result === undefined ? [] : toBars(result))),
  );
}

export function decodeYahooDividends(
  json: unknown,
  ticker: string,
): Effect.Effect<readonly DividendEvent[], ParseError | SymbolNotFound> {
  return decodeChart(json, ticker, true).pipe(
    Effect.map((result) => (result === undefined ? [] : toDividends(result))),
  );
}

export function decodeYahooSnapshot(
  json: unknown,
  ticker: string,
): Effect.Effect<QuoteSnapshot, ParseError | SymbolNotFound> {
  return decodeChart(json, ticker, false).pipe(
    Effect.map((result) => ({
      regularMarketPrice: result?.meta.regularMarketPrice,
    })),
  );
}

// --- Query strings ---

const toEpochSeconds = (date: string) => Math.floor(toEpochMs(date) / 1000);

export function historyQuery(start: string, end: string): string {
  return new URLSearchParams({
    period1: String(toEpochSeconds(start)),
    period2: String(toEpochSeconds(end)),
    interval: "1d",
    events: "div",
    includePrePost: "false",
  }).toString();
}

export function rangeQuery(range: string, interval: string): string {
  return new URLSearchParams({ range, interval, events: "div" }).toString();
}

// --- Yahoo Finance provider ---

/** True for the chart error Yahoo sends for a range before the listing date. */
export function isNoDataInRange(json: unknown): boolean {
  return Option.exists(
    Schema.decodeUnknownOption(YahooChartResponse)(json),
    ({ chart }) => NO_DATA_IN_RANGE.test(chart.error?.description ?? ""),
  );
}

const isSuccess = (status: number) => status >= 200 && status < 300;

export const makeYahooQuoteProvider: Effect.Effect<
  QuoteProviderService,
  ConfigError.ConfigError,
  HttpClient.HttpClient
> = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  // Non-2xx answers are HttpError, except the 400 Yahoo uses for a range
  // before the listing date, which goes to the decoder like a 200 would.
  const getChart = <A>(
    variant: TickerVariant,
    query: string,
    decode: (json: unknown, ticker: string) => Effect.Effect<A, ParseError | SymbolNotFound>,
  ): Effect.Effect<A, ProviderError> =>
    Effect.gen(function* () {
      const response = yield* client.get(
        `${baseUrl}/${encodeURIComponent(variant.ticker)}?${query}`,
      );
      if (isSuccess(response.status)) {
        return yield* decode(yield* response.json, variant.ticker);
      }
      const body = yield* response.json.pipe(
        Effect.orElseSucceed((): unknown => undefined),
      );
      if (isNoDataInRange(body)) {
        return yield* decode(body, variant.ticker);
      }
      return yield* Effect.fail(new HttpError({ status: response.status }));
    }).pipe(
      Effect.scoped,
      Effect.catchTags({
        RequestError: (e) =>
          Effect.fail(new NetworkError({ message: e.message })),
        ResponseError: (e) =>
          Effect.fail(
            new ParseError({ message: `JSON parse failed: ${e.message}` }),
          ),
      }),
    );

  return {
    fetchHistory: (variant, start, end) =>
      getChart(variant, historyQuery(start, end), decodeYahooBars),
    fetchRecent: (variant, lookbackDays) =>
      getChart(variant, rangeQuery(`${lookbackDays}d`, "1d"), decodeYahooBars),
    fetchDividends: (variant) =>
      getChart(variant, rangeQuery("max", "1mo"), decodeYahooDividends),
    fetchQuoteSnapshot: (variant) =>
      getChart(variant, rangeQuery("1d", "1d"), decodeYahooSnapshot),
  } satisfies QuoteProviderService;
});
