// In-memory PortfolioStore backed by a Ref, for tests and dry runs.

import { Effect, Layer, Option, Ref } from "effect";
import type { Holding, PriceQuote, ValuationSnapshot } from "../domain.ts";
import { PortfolioStore } from "../portfolio-store.ts";

export interface MemoryStoreState {
  readonly holdings: ReadonlyArray<Holding>;
  readonly prices: ReadonlyArray<PriceQuote>;
  readonly valuations: ReadonlyArray<ValuationSnapshot>;
}

export const emptyState: MemoryStoreState = {
  holdings: [],
  prices: [],
  valuations: [],
};

export const makeMemoryStore = (seed: Partial<MemoryStoreState> = {}) =>
  Effect.gen(function* () {
    const ref = yield* Ref.make<MemoryStoreState>({ ...emptyState, ...seed });

    const latestBy = <A extends { readonly timestamp: number }>(
      items: ReadonlyArray<A>,
    ): Option.Option<A> =>
      items.reduce<Option.Option<A>>(
        (best, item) =>
          Option.isSome(best) && best.value.timestamp > item.timestamp
            ? best
            : Option.some(item),
        Option.none(),
      );

    return PortfolioStore.of({
      getHoldings: Ref.get(ref).pipe(Effect.map((s) => s.holdings)),
      getSymbols: Ref.get(ref).pipe(
        Effect.map((s) => new Set(s.holdings.map((h) => h.symbol))),
      ),
      saveHolding: (holding) =>
        Ref.update(ref, (s) => ({
          ...s,
          holdings: [
            ...s.holdings.filter((h) => h.symbol !== holding.symbol),
            holding,
          ],
        })),

      savePrice: (quote) =>
        Ref.update(ref, (s) => ({ ...s, prices: [...s.prices, quote] })),
      getLastPrice: (symbol) =>
        Ref.get(ref).pipe(
          Effect.map((s) => latestBy(s.prices.filter((q) => q.symbol === symbol))),
        ),

      saveValuation: (snapshot) =>
        Ref.update(ref, (s) => ({
          ...s,
          valuations: [...s.valuations, snapshot],
        })),
      getLatestValuation: Ref.get(ref).pipe(
        Effect.map((s) => latestBy(s.valuations)),
      ),
      getValuationHistory: (since) =>
        Ref.get(ref).pipe(
          Effect.map((s) =>
            s.valuations
              .filter((v) => v.timestamp >= since)
              .sort((a, b) => b.timestamp - a.timestamp),
          ),
        ),
    });
  });

export const MemoryStoreLive = (seed: Partial<MemoryStoreState> = {}) =>
  Layer.effect(PortfolioStore, makeMemoryStore(seed));
