// Portfolio store: persistence contract for holdings, quotes and snapshots.

import { Context, Data, type Effect, type Option } from "effect";
import type { Holding, PriceQuote, ValuationSnapshot } from "./domain.ts";

export class StoreError extends Data.TaggedError("StoreError")<{
  readonly operation: string;
  readonly message: string;
}> {}

export class PortfolioStore extends Context.Tag("PortfolioStore")<
  PortfolioStore,
  {
    readonly getHoldings: Effect.Effect<ReadonlyArray<Holding>, StoreError>;
    /** Distinct symbols across all holdings. */
    readonly getSymbols: Effect.Effect<ReadonlySet<string>, StoreError>;
    /** Insert or replace the holding for `holding.symbol`. */
    readonly saveHolding: (holding: Holding) => Effect.Effect<void, StoreError>;

    readonly savePrice: (quote: PriceQuote) => Effect.Effect<void, StoreError>;
    readonly getLastPrice: (
      symbol: string,
    ) => Effect.Effect<Option.Option<PriceQuote>, StoreError>;

    readonly saveValuation: (
      snapshot: ValuationSnapshot,
    ) => Effect.Effect<void, StoreError>;
    readonly getLatestValuation: Effect.Effect<
      Option.Option<ValuationSnapshot>,
      StoreError
    >;
    /** Snapshots taken at or after `since` (epoch ms), newest first. */
    readonly getValuationHistory: (
      since: number,
    ) => Effect.Effect<ReadonlyArray<ValuationSnapshot>, StoreError>;
  }
>() {}
