import assert from "node:assert/strict";
import { test } from "node:test";
import { Effect, Either } from "effect";
import type { PriceQuote } from "./domain.ts";
import { resolveCurrentPrice } from "./current-price.ts";
import { NetworkError, type ResolutionFailure } from "./quote-provider.ts";
import {
  type Fixtures,
  inMemoryQuoteProviderLayer,
  sampleFixtures,
} from "./providers/quote-provider-mock.ts";

function resolve(
  symbol: string,
  fixtures: Fixtures = sampleFixtures,
): Promise<Either.Either<PriceQuote, ResolutionFailure>> {
  return Effect.runPromise(
    resolveCurrentPrice(symbol).pipe(
      Effect.either,
      Effect.provide(inMemoryQuoteProviderLayer(fixtures)),
    ),
  );
}

test("resolveCurrentPrice: latest close of the recent window", async () => {
  const result = await resolve("INCM");
  assert.ok(Either.isRight(result));
  assert.equal(result.right.price, 21.6);
  assert.equal(result.right.asOfDate, "2025-06-16");
  assert.equal(result.right.method, "RecentClose");
});

test("resolveCurrentPrice: snapshot price when there are no recent bars", async () => {
  const result = await resolve("SNAP", { SNAP: { bars: [], snapshotPrice: 8.25 } });
  assert.ok(Either.isRight(result));
  assert.equal(result.right.price, 8.25);
  assert.equal(result.right.asOfDate, undefined);
  assert.equal(result.right.method, "MarketSnapshot");
});

test("resolveCurrentPrice: zero close falls back to the snapshot", async () => {
  const result = await resolve("SNAP", {
    SNAP: { bars: [{ date: "2025-06-16", open: 8, close: 0 }], snapshotPrice: 8.1 },
  });
  assert.ok(Either.isRight(result));
  assert.equal(result.right.method, "MarketSnapshot");
});

test("resolveCurrentPrice: zero snapshot moves on to the next variant", async () => {
  const result = await resolve("SNAP", {
    SNAP: { bars: [], snapshotPrice: 0 },
    "SNAP.TO": { bars: [{ date: "2025-06-16", open: 5, close: 5.5 }] },
  });
  assert.ok(Either.isRight(result));
  assert.equal(result.right.variant.ticker, "SNAP.TO");
  assert.equal(result.right.price, 5.5);
});

test("resolveCurrentPrice: network failure on every variant is a resolution failure", async () => {
  const down = { failing: { recent: new NetworkError({ message: "offline" }) } };
  const result = await resolve("DOWN", {
    DOWN: down,
    "DOWN.TO": down,
    "DOWN.TSE": down,
    "DOWN.AX": down,
    "DOWN.L": down,
  });
  assert.ok(Either.isLeft(result));
  assert.equal(result.left.message, "offline");
});
