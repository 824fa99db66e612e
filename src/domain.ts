// Pure domain types: no framework dependency, no I/O.

/** Where a quote came from. `cached` marks a last-known quote reused
 *  after every live source failed. */
export type PriceSourceId = "yahoo" | "alphavantage" | "sample" | "cached";

export type LiveSourceId = Exclude<PriceSourceId, "cached">;

export interface Holding {
  readonly symbol: string;
  readonly quantity: number;
  readonly costBasis: number; // total paid for the position
}

export interface PriceQuote {
  readonly symbol: string;
  readonly price: number;
  readonly timestamp: number; // epoch ms
  readonly source: PriceSourceId;
}

export interface ValuationSnapshot {
  readonly timestamp: number; // epoch ms
  readonly totalValue: number;
  readonly perHolding: Readonly<Record<string, number>>;
}

export interface PerformanceRecord {
  readonly timestamp: number; // epoch ms
  readonly baselineValue: number;
  readonly absoluteGain: number;
  readonly percentReturn: number; // fraction, 0.5 = +50%
}

// --- Baseline ---

export type CostBasisBaseline = {
  readonly _tag: "CostBasis";
  readonly total: number;
};
export type SnapshotBaseline = {
  readonly _tag: "Snapshot";
  readonly snapshot: ValuationSnapshot;
};

export type Baseline = CostBasisBaseline | SnapshotBaseline;

export const CostBasis = (total: number): CostBasisBaseline => ({
  _tag: "CostBasis",
  total,
});

export const PriorSnapshot = (snapshot: ValuationSnapshot): SnapshotBaseline => ({
  _tag: "Snapshot",
  snapshot,
});

export type BaselineMode = "cost-basis" | "previous-snapshot";

export function baselineValue(baseline: Baseline): number {
  switch (baseline._tag) {
    case "CostBasis":
      return baseline.total;
    case "Snapshot":
      return baseline.snapshot.totalValue;
  }
}
