import { Effect, Option } from "effect";
import { assert, test } from "vitest";
import type { Holding, PriceQuote } from "./domain.ts";
import { sum } from "./money.ts";
import { PortfolioStore } from "./portfolio-store.ts";
import { MemoryStoreLive } from "./stores/memory-store.ts";
import { computeValuation, valueHoldings } from "./valuator.ts";

// --- Helpers ---

const NOW = Date.parse("2025-06-15T16:00:00Z");

function quote(symbol: string, price: number): PriceQuote {
  return { symbol, price, timestamp: NOW, source: "yahoo" };
}

function prices(...quotes: PriceQuote[]): ReadonlyMap<string, PriceQuote> {
  return new Map(quotes.map((q): [string, PriceQuote] => [q.symbol, q]));
}

// --- valueHoldings ---

test("valueHoldings: single holding is quantity times price", () => {
  const { snapshot, omitted } = valueHoldings(
    [{ symbol: "AAPL", quantity: 10, costBasis: 1000 }],
    prices(quote("AAPL", 150)),
    NOW,
  );

  assert.deepStrictEqual(snapshot, {
    timestamp: NOW,
    totalValue: 1500,
    perHolding: { AAPL: 1500 },
  });
  assert.deepStrictEqual(omitted, []);
});

test("valueHoldings: holdings without a price are omitted from the total", () => {
  const { snapshot, omitted } = valueHoldings(
    [
      { symbol: "AAPL", quantity: 10, costBasis: 1000 },
      { symbol: "XYZ", quantity: 5, costBasis: 200 },
    ],
    prices(quote("AAPL", 150)),
    NOW,
  );

  assert.strictEqual(snapshot.totalValue, 1500);
  assert.deepStrictEqual(Object.keys(snapshot.perHolding), ["AAPL"]);
  assert.deepStrictEqual(omitted, ["XYZ"]);
});

test("valueHoldings: repeated symbols are summed", () => {
  const { snapshot } = valueHoldings(
    [
      { symbol: "TSLA", quantity: 2, costBasis: 500 },
      { symbol: "TSLA", quantity: 3, costBasis: 700 },
    ],
    prices(quote("TSLA", 100.5)),
    NOW,
  );

  assert.deepStrictEqual(snapshot.perHolding, { TSLA: 502.5 });
  assert.strictEqual(snapshot.totalValue, 502.5);
});

test("valueHoldings: values are rounded to cents, half away from zero", () => {
  const { snapshot } = valueHoldings(
    [{ symbol: "GOOGL", quantity: 3, costBasis: 300 }],
    prices(quote("GOOGL", 33.335)),
    NOW,
  );

  // 3 * 33.335 = 100.005
  assert.strictEqual(snapshot.perHolding.GOOGL, 100.01);
});

test("valueHoldings: a half cent stored just below .5 still rounds up", () => {
  const { snapshot } = valueHoldings(
    [{ symbol: "A", quantity: 1, costBasis: 1 }],
    prices(quote("A", 1.005)),
    NOW,
  );

  assert.deepStrictEqual(snapshot.perHolding, { A: 1.01 });
  assert.strictEqual(snapshot.totalValue, 1.01);
});

test("valueHoldings: per-holding values sum to the total within a cent", () => {
  const holdings: Holding[] = [
    { symbol: "A", quantity: 3, costBasis: 1 },
    { symbol: "B", quantity: 7.25, costBasis: 1 },
    { symbol: "C", quantity: 0.333, costBasis: 1 },
    { symbol: "D", quantity: 1234, costBasis: 1 },
  ];
  const { snapshot } = valueHoldings(
    holdings,
    prices(quote("A", 10.017), quote("B", 99.999), quote("C", 0.07), quote("D", 3.3333)),
    NOW,
  );

  const parts = sum(Object.values(snapshot.perHolding));
  assert.isAtMost(Math.abs(parts - snapshot.totalValue), 0.01);
});

test("valueHoldings: zero quantity contributes zero", () => {
  const { snapshot } = valueHoldings(
    [{ symbol: "AAPL", quantity: 0, costBasis: 0 }],
    prices(quote("AAPL", 150)),
    NOW,
  );

  assert.deepStrictEqual(snapshot.perHolding, { AAPL: 0 });
  assert.strictEqual(snapshot.totalValue, 0);
});

// --- computeValuation ---

test("computeValuation: persists the snapshot it returns", async () => {
  const { snapshot, latest } = await Effect.runPromise(
    Effect.gen(function* () {
      const snapshot = yield* computeValuation(
        [{ symbol: "AAPL", quantity: 10, costBasis: 1000 }],
        prices(quote("AAPL", 150)),
      );
      const store = yield* PortfolioStore;
      const latest = yield* store.getLatestValuation;
      return { snapshot, latest };
    }).pipe(Effect.provide(MemoryStoreLive())),
  );

  assert.strictEqual(snapshot.totalValue, 1500);
  assert.deepStrictEqual(Option.getOrThrow(latest), snapshot);
});
