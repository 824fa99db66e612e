// Performance calculator: gain and return against a baseline.

import { Data, Effect, Option } from "effect";
import {
  type Baseline,
  type BaselineMode,
  baselineValue,
  CostBasis,
  type Holding,
  type PerformanceRecord,
  type PriceQuote,
  PriorSnapshot,
  type ValuationSnapshot,
} from "./domain.ts";
import { round2, sum } from "./money.ts";

export class ComputationError extends Data.TaggedError("ComputationError")<{
  readonly reason: "ZeroBaseline" | "MissingBaseline";
  readonly message: string;
}> {}

export function computePerformance(
  current: ValuationSnapshot,
  baseline: Baseline,
): Effect.Effect<PerformanceRecord, ComputationError> {
  const base = baselineValue(baseline);
  if (!(base > 0)) {
    return Effect.fail(
      new ComputationError({
        reason: "ZeroBaseline",
        message: `Baseline value ${base.toFixed(2)} leaves return undefined`,
      }),
    );
  }

  const absoluteGain = round2(current.totalValue - base);
  return Effect.succeed({
    timestamp: current.timestamp,
    baselineValue: base,
    absoluteGain,
    percentReturn: absoluteGain / base,
  });
}

export const totalCostBasis = (holdings: ReadonlyArray<Holding>): number =>
  round2(sum(holdings.map((h) => h.costBasis)));

/** `previous` must be the latest snapshot stored before the current run. */
export function resolveBaseline(
  mode: BaselineMode,
  holdings: ReadonlyArray<Holding>,
  previous: Option.Option<ValuationSnapshot>,
): Effect.Effect<Baseline, ComputationError> {
  switch (mode) {
    case "cost-basis":
      return Effect.succeed(CostBasis(totalCostBasis(holdings)));
    case "previous-snapshot":
      return Option.match(previous, {
        onNone: () =>
          Effect.fail(
            new ComputationError({
              reason: "MissingBaseline",
              message: "No earlier valuation to compare against",
            }),
          ),
        onSome: (snapshot) => Effect.succeed(PriorSnapshot(snapshot)),
      });
  }
}

// --- Per-holding ---

export interface HoldingPerformance {
  readonly symbol: string;
  readonly quantity: number;
  readonly costBasis: number;
  readonly price: Option.Option<number>;
  readonly marketValue: Option.Option<number>;
  readonly gain: Option.Option<number>;
  readonly percentReturn: Option.Option<number>;
}

/** Gain of each holding against its cost basis, best performers first.
 *  Holdings without a price or a cost basis sort last. */
export function holdingPerformance(
  holdings: ReadonlyArray<Holding>,
  prices: ReadonlyMap<string, PriceQuote>,
): ReadonlyArray<HoldingPerformance> {
  const rows = holdings.map((h): HoldingPerformance => {
    const price = Option.fromNullable(prices.get(h.symbol)).pipe(
      Option.map((q) => q.price),
    );
    const marketValue = Option.map(price, (p) => round2(h.quantity * p));
    const gain = Option.map(marketValue, (v) => round2(v - h.costBasis));
    return {
      symbol: h.symbol,
      quantity: h.quantity,
      costBasis: h.costBasis,
      price,
      marketValue,
      gain,
      percentReturn: Option.filter(gain, () => h.costBasis > 0).pipe(
        Option.map((g) => g / h.costBasis),
      ),
    };
  });

  const rank = (r: HoldingPerformance) =>
    Option.getOrElse(r.percentReturn, () => Number.NEGATIVE_INFINITY);

  return rows.sort((a, b) => rank(b) - rank(a));
}
