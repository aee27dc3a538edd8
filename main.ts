import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Effect, Layer, Logger, RateLimiter } from "effect";
import { runAnalysis } from "./src/analysis.ts";
import { LogLevelConfig, ProviderConfig } from "./src/config.ts";
import { formatFatal } from "./src/format.ts";
import { guardQuoteProvider } from "./src/provider-guard.ts";
import { QuoteProvider } from "./src/quote-provider.ts";
import { makeYahooQuoteProvider } from "./src/providers/yahoo-finance.ts";
import {
  makeInMemoryQuoteProvider,
  sampleFixtures,
} from "./src/providers/quote-provider-mock.ts";

// --- CLI ---

const output = Options.text("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Where to write the HTML report"),
  Options.withDefault("income_investing_report.html"),
);

const command = Command.make("income-report", { output }).pipe(
  Command.withHandler(({ output }) =>
    Effect.gen(function* () {
      yield* Console.log("Running Income Investing Analysis...");
      yield* runAnalysis({ outputPath: output });
      yield* Console.log("Analysis complete!");
    })
  ),
);

// --- Layers ---
// Every provider call shares one token bucket, one timeout and one retry
// policy, whichever provider is selected.

const QuoteProviderLive = Layer.scoped(
  QuoteProvider,
  Effect.gen(function* () {
    const settings = yield* ProviderConfig;
    const base = settings.provider === "test"
      ? makeInMemoryQuoteProvider(sampleFixtures)
      : yield* makeYahooQuoteProvider;
    const limiter = yield* RateLimiter.make({
      limit: settings.requestsPerSecond,
      interval: "1 second",
      algorithm: "token-bucket",
    });

    yield* Effect.logDebug(
      `[guard] provider=${settings.provider}, ${settings.requestsPerSecond} req/s`,
    );

    return guardQuoteProvider(base, {
      name: settings.provider,
      timeout: settings.timeout,
      retries: 2,
      retryDelay: "1 second",
      limiter,
    });
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "income-report",
  version: "0.1.0",
});

const fatal = (title: string, hint: string) =>
  Console.error(formatFatal(title, hint)).pipe(
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 1;
    })),
  );

const program = Effect.gen(function* () {
  const level = yield* LogLevelConfig;
  yield* cli(process.argv).pipe(
    Effect.provide(QuoteProviderLive),
    Logger.withMinimumLogLevel(level),
  );
});

program.pipe(
  Effect.catchTags({
    ConfigError: (e) => fatal("Invalid configuration", String(e)),
    ParseError: (e) => fatal("Unreadable symbol list", e.message),
    BadArgument: (e) => fatal("File error", e.message),
    SystemError: (e) => fatal("File error", e.message),
  }),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
