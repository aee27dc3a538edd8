// Exchange-suffixed ticker variants for a symbol.
//
// A base symbol may list on several exchanges. Each exchange is reached
// through a suffixed ticker; the order below is the order variants are
// tried and must not change.

import type { TickerVariant } from "./domain.ts";

export type ExchangeGroup = "canadian" | "australian" | "london";

const GROUP_SUFFIXES: Record<ExchangeGroup, readonly string[]> = {
  canadian: [".TO", ".TSE"],
  australian: [".AX"],
  london: [".L"],
};

const NEO_SUFFIX = ".NE";

export const DEFAULT_GROUPS: readonly ExchangeGroup[] = [
  "canadian",
  "australian",
  "london",
];

export const VERIFICATION_GROUPS: readonly ExchangeGroup[] = ["canadian"];

/** Canadian ETFs that only trade on the NEO exchange. */
export const NEO_LISTED: ReadonlySet<string> = new Set(["HHIS", "MSTE"]);

const KNOWN_SUFFIXES: readonly string[] = [
  ...Object.values(GROUP_SUFFIXES).flat(),
  NEO_SUFFIX,
];

export interface ExpandOptions {
  readonly groups?: readonly ExchangeGroup[];
  readonly neoListed?: boolean;
}

export function variant(base: string, suffix?: string): TickerVariant {
  return { base, suffix, ticker: suffix === undefined ? base : base + suffix };
}

export function hasKnownSuffix(symbol: string): boolean {
  return KNOWN_SUFFIXES.some((suffix) => symbol.endsWith(suffix));
}

export function expandTickerVariants(
  symbol: string,
  options: ExpandOptions = {},
): readonly TickerVariant[] {
  const base = symbol.trim().toUpperCase();
  if (hasKnownSuffix(base)) return [variant(base)];

  const groups = options.groups ?? DEFAULT_GROUPS;
  const neoListed = options.neoListed ?? NEO_LISTED.has(base);

  const suffixes = [
    ...groups.flatMap((group) => GROUP_SUFFIXES[group]),
    ...(neoListed ? [NEO_SUFFIX] : []),
  ];

  const seen = new Set<string>([base]);
  const variants: TickerVariant[] = [variant(base)];
  for (const suffix of suffixes) {
    const next = variant(base, suffix);
    if (seen.has(next.ticker)) continue;
    seen.add(next.ticker);
    variants.push(next);
  }
  return variants;
}
