// Tests for one full batch run against an in-memory store, a fixed-price
// source and a recording notifier.

import { Duration, Effect, Either, Layer, Option, TestClock, TestContext } from "effect";
import { assert, test } from "vitest";
import type { PriceQuote } from "./domain.ts";
import { Notifier, type RunSummary } from "./notifier.ts";
import { PortfolioStore } from "./portfolio-store.ts";
import { type FetcherConfig, PriceFetcherLive } from "./price-fetcher.ts";
import { makeSampleSource } from "./providers/sample.ts";
import { type RunOptions, runPortfolio, staleQuoteWarnings } from "./run.ts";
import { MemoryStoreLive, type MemoryStoreState } from "./stores/memory-store.ts";

// --- Helpers ---

const NOW = Date.parse("2025-06-15T16:00:00Z");

const fetcherConfig: FetcherConfig = {
  retryCount: 0,
  retryDelay: Duration.zero,
  sourceTimeout: "1 second",
  fallbackEnabled: true,
  validation: Option.none(),
  concurrency: 1,
};

const options: RunOptions = {
  baseline: "cost-basis",
  notify: true,
  staleAfter: Duration.days(1),
};

interface Delivery {
  readonly summary: RunSummary;
  readonly deliver: boolean;
}

function runWith(seed: Partial<MemoryStoreState>, runOptions: RunOptions = options) {
  const deliveries: Delivery[] = [];
  const RecordingNotifier = Layer.succeed(
    Notifier,
    Notifier.of({
      notify: (summary, deliver) =>
        Effect.sync(() => {
          deliveries.push({ summary, deliver });
        }),
    }),
  );

  const AppTest = Layer.mergeAll(
    PriceFetcherLive([makeSampleSource({ AAPL: 150 })], fetcherConfig),
    RecordingNotifier,
  ).pipe(Layer.provideMerge(MemoryStoreLive(seed)));

  return Effect.runPromise(
    Effect.gen(function* () {
      yield* TestClock.setTime(NOW);
      const result = yield* runPortfolio(runOptions);
      const store = yield* PortfolioStore;
      const history = yield* store.getValuationHistory(0);
      return { result, history, deliveries };
    }).pipe(Effect.provide(AppTest), Effect.provide(TestContext.TestContext)),
  );
}

const xyzAt42: PriceQuote = {
  symbol: "XYZ",
  price: 42,
  timestamp: Date.parse("2025-06-13T16:00:00Z"),
  source: "yahoo",
};

// --- runPortfolio ---

test("runPortfolio: no holdings ends the run without a snapshot or notification", async () => {
  const { result, history, deliveries } = await runWith({});

  assert.strictEqual(Option.isNone(result), true);
  assert.strictEqual(history.length, 0);
  assert.strictEqual(deliveries.length, 0);
});

test("runPortfolio: values holdings and measures against cost basis", async () => {
  const { result, history, deliveries } = await runWith({
    holdings: [{ symbol: "AAPL", quantity: 10, costBasis: 1000 }],
  });
  const summary = Option.getOrThrow(result);

  assert.deepStrictEqual(summary.snapshot, {
    timestamp: NOW,
    totalValue: 1500,
    perHolding: { AAPL: 1500 },
  });
  assert.deepStrictEqual(Either.getOrThrow(summary.performance), {
    timestamp: NOW,
    baselineValue: 1000,
    absoluteGain: 500,
    percentReturn: 0.5,
  });
  assert.deepStrictEqual(summary.warnings, []);
  assert.deepStrictEqual(history, [summary.snapshot]);
  assert.strictEqual(deliveries.length, 1);
  assert.strictEqual(deliveries[0].deliver, true);
});

test("runPortfolio: failing symbol falls back to its last known price", async () => {
  const { result } = await runWith({
    holdings: [
      { symbol: "AAPL", quantity: 10, costBasis: 1000 },
      { symbol: "XYZ", quantity: 5, costBasis: 200 },
    ],
    prices: [xyzAt42],
  });
  const summary = Option.getOrThrow(result);

  assert.deepStrictEqual(summary.snapshot.perHolding, { AAPL: 1500, XYZ: 210 });
  assert.strictEqual(summary.snapshot.totalValue, 1710);
  assert.deepStrictEqual(Either.getOrThrow(summary.performance), {
    timestamp: NOW,
    baselineValue: 1200,
    absoluteGain: 510,
    percentReturn: 510 / 1200,
  });
  assert.strictEqual(summary.quotes.get("XYZ")?.source, "cached");
  assert.deepStrictEqual(summary.warnings, [
    {
      symbol: "XYZ",
      message: "all sources failed; using last known price 42.00 from 2025-06-13T16:00:00.000Z",
    },
    { symbol: "XYZ", message: "price is 2 days old" },
  ]);
});

test("runPortfolio: previous-snapshot baseline reads the snapshot stored before this run", async () => {
  const { result, history } = await runWith(
    {
      holdings: [{ symbol: "AAPL", quantity: 10, costBasis: 1000 }],
      valuations: [{ timestamp: NOW - 86_400_000, totalValue: 1200, perHolding: { AAPL: 1200 } }],
    },
    { ...options, baseline: "previous-snapshot" },
  );
  const summary = Option.getOrThrow(result);

  assert.deepStrictEqual(Either.getOrThrow(summary.performance), {
    timestamp: NOW,
    baselineValue: 1200,
    absoluteGain: 300,
    percentReturn: 0.25,
  });
  assert.deepStrictEqual(
    history.map((s) => s.totalValue),
    [1500, 1200],
  );
});

test("runPortfolio: missing previous snapshot is reported, not fatal", async () => {
  const { result, history, deliveries } = await runWith(
    { holdings: [{ symbol: "AAPL", quantity: 10, costBasis: 1000 }] },
    { ...options, baseline: "previous-snapshot", notify: false },
  );
  const summary = Option.getOrThrow(result);

  assert.strictEqual(Either.isLeft(summary.performance), true);
  if (Either.isLeft(summary.performance)) {
    assert.strictEqual(summary.performance.left.reason, "MissingBaseline");
  }
  assert.strictEqual(history.length, 1);
  assert.strictEqual(deliveries[0].deliver, false);
});

// --- staleQuoteWarnings ---

test("staleQuoteWarnings: only quotes older than the limit are flagged", () => {
  const quotes = new Map<string, PriceQuote>([
    ["XYZ", xyzAt42],
    ["AAPL", { symbol: "AAPL", price: 150, timestamp: NOW - 3_600_000, source: "yahoo" }],
  ]);

  assert.deepStrictEqual(staleQuoteWarnings(quotes, NOW, Duration.days(1)), [
    { symbol: "XYZ", message: "price is 2 days old" },
  ]);
});

test("staleQuoteWarnings: ages under a day are given in hours", () => {
  const quotes = new Map<string, PriceQuote>([
    ["AAPL", { symbol: "AAPL", price: 150, timestamp: NOW - 7 * 3_600_000, source: "yahoo" }],
  ]);

  assert.deepStrictEqual(staleQuoteWarnings(quotes, NOW, Duration.hours(6)), [
    { symbol: "AAPL", message: "price is 7 hours old" },
  ]);
});
