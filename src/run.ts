// One batch run: fetch prices, value the portfolio, measure performance and
// dispatch the summary.

import { Clock, Console, Duration, Effect, Option } from "effect";
import type { BaselineMode, PriceQuote } from "./domain.ts";
import { age, formatSummary } from "./format.ts";
import { Notifier, type RunSummary } from "./notifier.ts";
import {
  computePerformance,
  holdingPerformance,
  resolveBaseline,
} from "./performance.ts";
import { PortfolioStore } from "./portfolio-store.ts";
import {
  availableQuotes,
  PriceFetcher,
  type PriceWarning,
} from "./price-fetcher.ts";
import { computeValuation } from "./valuator.ts";

export interface RunOptions {
  readonly baseline: BaselineMode;
  readonly notify: boolean;
  readonly staleAfter: Duration.DurationInput;
}

/** Warnings for quotes observed more than `maxAge` before `now`. */
export function staleQuoteWarnings(
  quotes: ReadonlyMap<string, PriceQuote>,
  now: number,
  maxAge: Duration.DurationInput,
): ReadonlyArray<PriceWarning> {
  const limit = Duration.toMillis(maxAge);
  const warnings: PriceWarning[] = [];
  for (const quote of quotes.values()) {
    const elapsed = now - quote.timestamp;
    if (elapsed > limit) {
      warnings.push({
        symbol: quote.symbol,
        message: `price is ${age(elapsed)} old`,
      });
    }
  }
  return warnings;
}

/** Resolves to `None` when there are no holdings to value. A store failure
 *  aborts the run; a performance failure is reported in the summary. */
export const runPortfolio = (options: RunOptions) =>
  Effect.gen(function* () {
    const store = yield* PortfolioStore;
    const fetcher = yield* PriceFetcher;
    const notifier = yield* Notifier;

    const holdings = yield* store.getHoldings;
    if (holdings.length === 0) {
      yield* Console.warn("No holdings found");
      return Option.none<RunSummary>();
    }

    const symbols = yield* store.getSymbols;
    // Read before this run's snapshot is saved.
    const previous = yield* store.getLatestValuation;

    const report = yield* fetcher.fetchPrices(symbols);
    const quotes = availableQuotes(report);
    const snapshot = yield* computeValuation(holdings, quotes);

    const performance = yield* resolveBaseline(options.baseline, holdings, previous).pipe(
      Effect.flatMap((baseline) => computePerformance(snapshot, baseline)),
      Effect.either,
    );

    const now = yield* Clock.currentTimeMillis;
    const summary: RunSummary = {
      snapshot,
      baseline: options.baseline,
      performance,
      holdings: holdingPerformance(holdings, quotes),
      quotes,
      warnings: [
        ...report.warnings,
        ...staleQuoteWarnings(quotes, now, options.staleAfter),
      ],
    };

    yield* Console.log(formatSummary(summary));
    yield* notifier.notify(summary, options.notify).pipe(
      Effect.catchTag("NotificationError", (e) =>
        Console.error(`Notification failed: ${e.message}`),
      ),
    );

    return Option.some(summary);
  });
