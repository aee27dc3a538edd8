import assert from "node:assert/strict";
import { test } from "node:test";
import {
  expandTickerVariants,
  hasKnownSuffix,
  VERIFICATION_GROUPS,
} from "./ticker-variants.ts";

const tickers = (symbol: string, options?: Parameters<typeof expandTickerVariants>[1]) =>
  expandTickerVariants(symbol, options).map((v) => v.ticker);

// --- expandTickerVariants ---

test("expandTickerVariants: base symbol first, then Canadian, Australian, London", () => {
  assert.deepEqual(tickers("OXLC"), ["OXLC", "OXLC.TO", "OXLC.TSE", "OXLC.AX", "OXLC.L"]);
});

test("expandTickerVariants: NEO-listed symbol gets the .NE variant last", () => {
  assert.deepEqual(tickers("HHIS"), [
    "HHIS",
    "HHIS.TO",
    "HHIS.TSE",
    "HHIS.AX",
    "HHIS.L",
    "HHIS.NE",
  ]);
});

test("expandTickerVariants: neoListed hint overrides the built-in set", () => {
  assert.deepEqual(tickers("ABC", { groups: [], neoListed: true }), ["ABC", "ABC.NE"]);
  assert.deepEqual(tickers("MSTE", { groups: [], neoListed: false }), ["MSTE"]);
});

test("expandTickerVariants: already-suffixed symbol is not suffixed again", () => {
  assert.deepEqual(tickers("XYZ.L"), ["XYZ.L"]);
  assert.deepEqual(tickers("XYZ.TO"), ["XYZ.TO"]);
});

test("expandTickerVariants: verification groups only add Canadian suffixes", () => {
  assert.deepEqual(tickers("GOF", { groups: VERIFICATION_GROUPS }), ["GOF", "GOF.TO", "GOF.TSE"]);
  assert.deepEqual(tickers("MSTE", { groups: VERIFICATION_GROUPS }), [
    "MSTE",
    "MSTE.TO",
    "MSTE.TSE",
    "MSTE.NE",
  ]);
});

test("expandTickerVariants: repeated groups do not produce duplicates", () => {
  assert.deepEqual(tickers("PDI", { groups: ["london", "london"] }), ["PDI", "PDI.L"]);
});

test("expandTickerVariants: trims and upper-cases the symbol", () => {
  const [first] = expandTickerVariants("  oxlc ");
  assert.deepEqual(first, { base: "OXLC", suffix: undefined, ticker: "OXLC" });
});

test("expandTickerVariants: suffixed variants keep base and suffix apart", () => {
  const variants = expandTickerVariants("PDI", { groups: ["australian"] });
  assert.deepEqual(variants[1], { base: "PDI", suffix: ".AX", ticker: "PDI.AX" });
});

// --- hasKnownSuffix ---

test("hasKnownSuffix: recognises exchange suffixes only", () => {
  assert.equal(hasKnownSuffix("ABC.NE"), true);
  assert.equal(hasKnownSuffix("ABC.AX"), true);
  assert.equal(hasKnownSuffix("BRK.B"), false);
  assert.equal(hasKnownSuffix("ABC"), false);
});
