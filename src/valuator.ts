// Portfolio valuator: market value per holding and in total.

import { Clock, Console, Effect } from "effect";
import type { Holding, PriceQuote, ValuationSnapshot } from "./domain.ts";
import { round2, sum } from "./money.ts";
import { PortfolioStore, type StoreError } from "./portfolio-store.ts";

export interface Valuation {
  readonly snapshot: ValuationSnapshot;
  /** Symbols held but left out for lack of a price. */
  readonly omitted: ReadonlyArray<string>;
}

/** Each per-holding value is rounded to cents and the total is the rounded
 *  sum of those, so the two always agree. */
export function valueHoldings(
  holdings: ReadonlyArray<Holding>,
  prices: ReadonlyMap<string, PriceQuote>,
  timestamp: number,
): Valuation {
  const perHolding: Record<string, number> = {};
  const omitted: string[] = [];

  for (const h of holdings) {
    const quote = prices.get(h.symbol);
    if (quote === undefined) {
      if (!omitted.includes(h.symbol)) omitted.push(h.symbol);
      continue;
    }
    const value = round2(h.quantity * quote.price);
    perHolding[h.symbol] = round2((perHolding[h.symbol] ?? 0) + value);
  }

  return {
    snapshot: {
      timestamp,
      totalValue: round2(sum(Object.values(perHolding))),
      perHolding,
    },
    omitted,
  };
}

export const computeValuation = (
  holdings: ReadonlyArray<Holding>,
  prices: ReadonlyMap<string, PriceQuote>,
): Effect.Effect<ValuationSnapshot, StoreError, PortfolioStore> =>
  Effect.gen(function* () {
    const store = yield* PortfolioStore;
    const timestamp = yield* Clock.currentTimeMillis;
    const { snapshot, omitted } = valueHoldings(holdings, prices, timestamp);

    for (const symbol of omitted) {
      yield* Console.warn(`[valuator] ${symbol}: no price, omitted from valuation`);
    }

    yield* store.saveValuation(snapshot);
    yield* Console.debug(
      `[valuator] ${Object.keys(snapshot.perHolding).length} holdings valued at ${snapshot.totalValue.toFixed(2)}`,
    );
    return snapshot;
  });
