// Sample source: fixed prices for dry runs and tests.

import { Effect } from "effect";
import { type PriceSource, SymbolNotFound } from "../price-source.ts";

export const SAMPLE_PRICES: Readonly<Record<string, number>> = {
  AAPL: 225.3,
  GOOGL: 190.5,
  TSLA: 385.2,
};

export const makeSampleSource = (
  prices: Readonly<Record<string, number>> = SAMPLE_PRICES,
): PriceSource => ({
  id: "sample",
  getPrice: (symbol: string) => {
    const price = prices[symbol.toUpperCase()];
    return price !== undefined
      ? Effect.succeed(price)
      : Effect.fail(new SymbolNotFound({ symbol }));
  },
});
