import assert from "node:assert/strict";
import { test } from "node:test";
import { FileSystem, Path } from "@effect/platform";
import { ConfigProvider, Effect, Layer } from "effect";
import { runAnalysis } from "./analysis.ts";
import {
  inMemoryQuoteProviderLayer,
  sampleFixtures,
} from "./providers/quote-provider-mock.ts";

test("runAnalysis: processes the configured symbols and writes the report", async () => {
  const written = new Map<string, string>();
  const layer = Layer.mergeAll(
    inMemoryQuoteProviderLayer(sampleFixtures),
    Path.layer,
    FileSystem.layerNoop({
      writeFileString: (path, data) =>
        Effect.sync(() => {
          written.set(path, data);
        }),
    }),
  );
  const config = ConfigProvider.fromMap(
    new Map([
      ["SYMBOLS", "incm,ZZZZ,NEWF,INCM"],
      ["END_DATE", "2025-06-16"],
      ["INVESTMENT_AMOUNT", "5000"],
    ]),
  );

  const report = await Effect.runPromise(
    runAnalysis({ outputPath: "report.html" }).pipe(
      Effect.provide(layer),
      Effect.withConfigProvider(config),
    ),
  );

  assert.deepEqual(report.records.map((r) => r.symbol), ["INCM", "ZZZZ", "NEWF"]);
  assert.deepEqual(report.failed.map((r) => r.symbol), ["ZZZZ"]);
  assert.equal(report.working[0].sharesPurchased, 250);

  const html = written.get("report.html");
  assert.ok(html !== undefined);
  assert.ok(html.includes("<strong>Investment per Symbol:</strong> $5,000.00"));
  assert.ok(html.includes("<strong>Reference Date:</strong> 02/01/2025 |"));
  assert.ok(html.includes("<li>**NEWF: Started trading on 05/03/2025</li>"));
});

test("runAnalysis: invalid configuration fails before any work", async () => {
  const result = await Effect.runPromise(
    runAnalysis({ outputPath: "report.html" }).pipe(
      Effect.provide(
        Layer.mergeAll(inMemoryQuoteProviderLayer(sampleFixtures), Path.layer, FileSystem.layerNoop({})),
      ),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["START_DATE", "01/02/2025"]]))),
      Effect.either,
    ),
  );
  assert.equal(result._tag, "Left");
});
