import { Console, Effect, Either } from "effect";
import type {
  DividendCollection,
  HistoricalQuote,
  PortfolioRecord,
  PriceQuote,
  VerificationOutcome,
} from "./domain.ts";
import { resolveCurrentPrice } from "./current-price.ts";
import { collectDividends } from "./dividends.ts";
import { resolveHistoricalPrice } from "./historical-price.ts";
import type { QuoteProvider, ResolutionFailure } from "./quote-provider.ts";
import { verificationStatus } from "./verification.ts";

/** Suffix marking a symbol that started trading after the reference date. */
export const FALLBACK_MARKER = "**";

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

const money = (value: number) => roundTo(value, 2);
const percent = (value: number) => roundTo(value, 1);

function percentOf(value: number, investmentAmount: number): number {
  return investmentAmount === 0 ? 0 : (value / investmentAmount) * 100;
}

// --- Pure construction ---

export interface RecordInputs {
  readonly symbol: string;
  readonly investmentAmount: number;
  readonly initial: HistoricalQuote;
  readonly current: Either.Either<PriceQuote, ResolutionFailure>;
  readonly dividends: DividendCollection;
}

export function computeRecord(inputs: RecordInputs): PortfolioRecord {
  const { symbol, investmentAmount, initial, current, dividends } = inputs;
  const shares = investmentAmount / initial.price;

  const latest = Either.getOrUndefined(current);
  const priced = latest !== undefined;
  const currentPrice = latest?.price ?? 0;
  const currentValue = shares * currentPrice;
  const gainLoss = priced ? currentValue - investmentAmount : 0;
  const totalReturn = gainLoss + dividends.totalCollected;

  return {
    symbol,
    displaySymbol: initial.isFallbackDate ? symbol + FALLBACK_MARKER : symbol,
    initialPrice: money(initial.price),
    sharesPurchased: money(shares),
    currentPrice: money(currentPrice),
    currentValue: money(currentValue),
    dividendsCollected: money(dividends.totalCollected),
    dividendPayments: dividends.paymentCount,
    gainLoss: money(gainLoss),
    gainLossPercent: percent(percentOf(gainLoss, investmentAmount)),
    totalReturn: money(totalReturn),
    totalReturnPercent: priced
      ? percent(percentOf(totalReturn, investmentAmount))
      : 0,
    status: "Verified",
    isFallbackDate: initial.isFallbackDate,
    actualStartDate: initial.asOfDate,
    currentPriceDate: latest?.asOfDate,
    detail: Either.isLeft(current)
      ? `Current price unavailable: ${current.left.message}`
      : undefined,
  };
}

const zeroed = {
  currentPrice: 0,
  currentValue: 0,
  dividendsCollected: 0,
  dividendPayments: 0,
  gainLoss: 0,
  gainLossPercent: 0,
  totalReturn: 0,
  totalReturnPercent: 0,
  isFallbackDate: false,
  actualStartDate: undefined,
  currentPriceDate: undefined,
} as const;

/** Record built from the verifier when the historical resolver failed. */
export function degradedRecord(
  symbol: string,
  investmentAmount: number,
  outcome: VerificationOutcome,
): PortfolioRecord {
  const average = outcome.averagePrice;
  return {
    ...zeroed,
    symbol,
    displaySymbol: symbol,
    initialPrice: average === undefined ? 0 : money(average),
    sharesPurchased: average === undefined ? 0 : money(investmentAmount / average),
    status: verificationStatus(outcome),
    detail: outcome.error,
  };
}

export function failedRecord(
  symbol: string,
  status: "NoData" | "Error",
  detail: string,
): PortfolioRecord {
  return {
    ...zeroed,
    symbol,
    displaySymbol: symbol,
    initialPrice: 0,
    sharesPurchased: 0,
    status,
    detail,
  };
}

// --- Builder ---

export function buildPortfolioRecord(
  symbol: string,
  preferredStartDate: string,
  endDate: string,
  investmentAmount: number,
): Effect.Effect<PortfolioRecord, ResolutionFailure, QuoteProvider> {
  return Effect.gen(function* () {
    yield* Console.log(`Processing ${symbol}...`);

    const initial = yield* resolveHistoricalPrice(symbol, preferredStartDate);
    const shares = investmentAmount / initial.price;

    const [current, dividends] = yield* Effect.all(
      [
        Effect.either(resolveCurrentPrice(symbol)),
        collectDividends(symbol, initial.asOfDate, endDate, shares),
      ],
      { concurrency: 2 },
    );

    const record = computeRecord({
      symbol,
      investmentAmount,
      initial,
      current,
      dividends,
    });

    yield* Either.isRight(current)
      ? Console.log(
        `  💰 Current value: $${record.currentValue.toFixed(2)} (${signed(record.gainLossPercent)}%)`,
      )
      : Console.log(`  ❌ Could not get current price: ${current.left.message}`);
    return record;
  });
}

export function signed(value: number, decimals = 1): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(decimals)}`;
}
