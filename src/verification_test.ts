// Tests for the cross-validation verifier:
// - classifySamples: agreement threshold and single/zero-sample outcomes
// - nearestBar: distance and tie-breaking
// - verifyHistoricalPrice: the two lookups against an in-memory provider

import assert from "node:assert/strict";
import { test } from "node:test";
import { Effect, Option } from "effect";
import type { VerificationOutcome } from "./domain.ts";
import {
  classifySamples,
  nearestBar,
  type PriceSample,
  verificationStatus,
  verifyHistoricalPrice,
} from "./verification.ts";
import {
  type Fixtures,
  inMemoryQuoteProviderLayer,
} from "./providers/quote-provider-mock.ts";

// --- Helpers ---

const sample = (price: number, ticker = "ABC"): PriceSample => ({
  method: "HistoryPreferredDate",
  ticker,
  price,
});

function verify(symbol: string, fixtures: Fixtures): Promise<VerificationOutcome> {
  return Effect.runPromise(
    verifyHistoricalPrice(symbol, "2025-01-02").pipe(
      Effect.provide(inMemoryQuoteProviderLayer(fixtures)),
    ),
  );
}

// --- classifySamples ---

test("classifySamples: prices within 1% of their mean are verified", () => {
  const outcome = classifySamples([sample(100), sample(100.5)]);
  assert.equal(outcome.averagePrice, 100.25);
  assert.equal(outcome.verified, true);
  assert.equal(outcome.error, undefined);
  assert.deepEqual(outcome.individualPrices, [100, 100.5]);
  assert.equal(verificationStatus(outcome), "Verified");
});

test("classifySamples: prices further apart than 1% are not verified", () => {
  const outcome = classifySamples([sample(100), sample(103)]);
  assert.equal(outcome.averagePrice, 101.5);
  assert.equal(outcome.verified, false);
  assert.ok(outcome.maxRelativeDeviation !== undefined && outcome.maxRelativeDeviation > 0.01);
  assert.equal(verificationStatus(outcome), "AlternateSource");
});

test("classifySamples: a single sample is a price but never verified", () => {
  const outcome = classifySamples([sample(42)]);
  assert.equal(outcome.averagePrice, 42);
  assert.equal(outcome.verified, false);
  assert.equal(outcome.maxRelativeDeviation, undefined);
  assert.equal(verificationStatus(outcome), "AlternateSource");
});

test("classifySamples: no samples is an error with no price", () => {
  const outcome = classifySamples([]);
  assert.equal(outcome.averagePrice, undefined);
  assert.equal(outcome.error, "All verification methods failed");
  assert.equal(verificationStatus(outcome), "NoData");
});

test("classifySamples: methods used mirror the samples", () => {
  const outcome = classifySamples([sample(10, "ABC"), sample(10, "ABC.TO")]);
  assert.deepEqual(outcome.methodsUsed, [
    { method: "HistoryPreferredDate", ticker: "ABC" },
    { method: "HistoryPreferredDate", ticker: "ABC.TO" },
  ]);
});

// --- nearestBar ---

test("nearestBar: closest usable bar to the target", () => {
  const bars = [
    { date: "2024-12-31", open: 1, close: 1 },
    { date: "2025-01-03", open: 0, close: 0 },
    { date: "2025-01-05", open: 3, close: 3 },
  ];
  assert.equal(Option.getOrUndefined(nearestBar(bars, "2025-01-03"))?.date, "2025-01-05");
});

test("nearestBar: the earlier bar wins a tie", () => {
  const bars = [
    { date: "2025-01-01", open: 1, close: 1 },
    { date: "2025-01-03", open: 2, close: 2 },
  ];
  assert.equal(Option.getOrUndefined(nearestBar(bars, "2025-01-02"))?.date, "2025-01-01");
  assert.ok(Option.isNone(nearestBar([], "2025-01-02")));
});

// --- verifyHistoricalPrice ---

test("verifyHistoricalPrice: both lookups agree within tolerance", async () => {
  const outcome = await verify("ABC", {
    ABC: {
      bars: [
        { date: "2025-01-01", open: 100.5, close: 100.5 },
        { date: "2025-01-03", open: 100.0, close: 100.0 },
      ],
    },
  });
  // Anchored lookup opens on 01-03; the ranged lookup picks 01-01 on the tie.
  assert.deepEqual(outcome.individualPrices, [100.0, 100.5]);
  assert.deepEqual(outcome.methodsUsed.map((m) => m.method), [
    "HistoryPreferredDate",
    "DownloadRangeNearest",
  ]);
  assert.equal(outcome.averagePrice, 100.25);
  assert.equal(outcome.verified, true);
});

test("verifyHistoricalPrice: disagreeing lookups give an unverified average", async () => {
  const outcome = await verify("ABC", {
    ABC: {
      bars: [
        { date: "2025-01-01", open: 103, close: 103 },
        { date: "2025-01-03", open: 100, close: 100 },
      ],
    },
  });
  assert.deepEqual(outcome.individualPrices, [100, 103]);
  assert.equal(outcome.averagePrice, 101.5);
  assert.equal(outcome.verified, false);
});

test("verifyHistoricalPrice: only Canadian variants are tried", async () => {
  const outcome = await verify("ABC", {
    "ABC.TSE": { bars: [{ date: "2025-01-02", open: 7, close: 7 }] },
    "ABC.L": { bars: [{ date: "2025-01-02", open: 99, close: 99 }] },
  });
  assert.deepEqual(outcome.individualPrices, [7, 7]);
  assert.ok(outcome.methodsUsed.every((m) => m.ticker === "ABC.TSE"));
});

test("verifyHistoricalPrice: nothing anywhere reports all methods failed", async () => {
  const outcome = await verify("ABC", { "ABC.L": { bars: [{ date: "2025-01-02", open: 5, close: 5 }] } });
  assert.equal(outcome.averagePrice, undefined);
  assert.equal(outcome.verified, false);
  assert.equal(outcome.error, "All verification methods failed");
});
