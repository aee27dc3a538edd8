// Types shared by the resolvers, the batch and the renderers.
//
// Calendar dates are ISO "YYYY-MM-DD" strings in the listing exchange's
// local time.

// --- Provider data ---

export interface TickerVariant {
  readonly base: string;
  readonly suffix: string | undefined;
  readonly ticker: string;
}

export interface PriceBar {
  readonly date: string;
  readonly open: number;
  readonly close: number;
}

export interface DividendEvent {
  readonly exDate: string;
  readonly amount: number; // per share
}

export interface QuoteSnapshot {
  readonly regularMarketPrice: number | undefined;
}

// --- Resolved prices ---

export type PriceMethod =
  | "HistoryPreferredDate"
  | "HistoryEarliestAvailable"
  | "DownloadRangeNearest"
  | "RecentClose"
  | "MarketSnapshot";

export interface PriceQuote {
  readonly price: number;
  readonly asOfDate: string | undefined;
  readonly variant: TickerVariant;
  readonly method: PriceMethod;
}

export interface HistoricalQuote extends PriceQuote {
  readonly asOfDate: string;
  readonly isFallbackDate: boolean;
}

export interface DividendCollection {
  readonly totalCollected: number;
  readonly paymentCount: number;
  readonly perShareTotal: number;
}

// --- Verification ---

export interface MethodUsed {
  readonly method: PriceMethod;
  readonly ticker: string;
}

export interface VerificationOutcome {
  readonly averagePrice: number | undefined;
  readonly verified: boolean;
  readonly methodsUsed: readonly MethodUsed[];
  readonly individualPrices: readonly number[];
  readonly maxRelativeDeviation: number | undefined;
  readonly error: string | undefined;
}

export type VerificationStatus =
  | "Verified"
  | "AlternateSource"
  | "NoData"
  | "Error";

// --- Portfolio ---

export interface PortfolioRecord {
  readonly symbol: string;
  readonly displaySymbol: string;
  readonly initialPrice: number;
  readonly sharesPurchased: number;
  readonly currentPrice: number;
  readonly currentValue: number;
  readonly dividendsCollected: number;
  readonly dividendPayments: number;
  readonly gainLoss: number;
  readonly gainLossPercent: number;
  readonly totalReturn: number;
  readonly totalReturnPercent: number;
  readonly status: VerificationStatus;
  readonly isFallbackDate: boolean;
  readonly actualStartDate: string | undefined;
  readonly currentPriceDate: string | undefined;
  readonly detail: string | undefined;
}

export interface PriceCheck {
  readonly symbol: string;
  readonly price: number;
  readonly verified: boolean;
  readonly reason: string | undefined;
}

export interface VerificationSummary {
  readonly verifiedCount: number;
  readonly total: number;
  readonly unverified: readonly PriceCheck[];
}

export interface BatchReport {
  readonly records: readonly PortfolioRecord[];
  readonly working: readonly PortfolioRecord[];
  readonly failed: readonly PortfolioRecord[];
  readonly verification: VerificationSummary;
}
