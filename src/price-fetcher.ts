// Price fetcher: tries sources in priority order, persists every fresh quote,
// and degrades to the last persisted quote when all sources fail.

import {
  Clock,
  Console,
  Context,
  Data,
  type Duration,
  Effect,
  Layer,
  Option,
  Schedule,
} from "effect";
import type { LiveSourceId, PriceQuote } from "./domain.ts";
import { describeSourceError } from "./format.ts";
import {
  InvalidPrice,
  isTransient,
  type PriceSource,
  type PriceSourceError,
  TimeoutError,
} from "./price-source.ts";
import { PortfolioStore, type StoreError } from "./portfolio-store.ts";

// --- Config ---

export interface PriceBounds {
  readonly min: number;
  readonly max: number;
}

export interface FetcherConfig {
  /** Extra attempts per source for transient failures. */
  readonly retryCount: number;
  readonly retryDelay: Duration.DurationInput;
  readonly sourceTimeout: Duration.DurationInput;
  /** When false only the first source is ever asked. */
  readonly fallbackEnabled: boolean;
  readonly validation: Option.Option<PriceBounds>;
  readonly concurrency: number;
}

// --- Errors ---

export interface SourceFailure {
  readonly source: LiveSourceId;
  readonly error: PriceSourceError;
}

export class FetchError extends Data.TaggedError("FetchError")<{
  readonly symbol: string;
  readonly attempts: ReadonlyArray<SourceFailure>;
  readonly message: string;
}> {}

const fetchError = (symbol: string, attempts: ReadonlyArray<SourceFailure>) =>
  new FetchError({
    symbol,
    attempts,
    message:
      attempts.length === 0
        ? `${symbol}: no price sources configured`
        : `${symbol}: no price from ${attempts.map((a) => `${a.source} (${describeSourceError(a.error)})`).join(", ")}`,
  });

// --- Report ---

export interface PriceWarning {
  readonly symbol: string;
  readonly message: string;
}

export interface PriceReport {
  readonly prices: ReadonlyMap<string, PriceQuote | FetchError>;
  readonly warnings: ReadonlyArray<PriceWarning>;
}

export const isFetchError = (u: PriceQuote | FetchError): u is FetchError =>
  u instanceof FetchError;

/** Quotes usable for valuation: fresh ones and cached fallbacks. */
export function availableQuotes(report: PriceReport): ReadonlyMap<string, PriceQuote> {
  const quotes = new Map<string, PriceQuote>();
  for (const [symbol, result] of report.prices) {
    if (!isFetchError(result)) quotes.set(symbol, result);
  }
  return quotes;
}

// --- Per-source guard ---

export function validatePrice(
  price: number,
  bounds: Option.Option<PriceBounds>,
): Effect.Effect<number, InvalidPrice> {
  if (!Number.isFinite(price) || price <= 0) {
    return Effect.fail(
      new InvalidPrice({ price, message: "Price must be a positive number" }),
    );
  }
  if (Option.isSome(bounds) && (price < bounds.value.min || price > bounds.value.max)) {
    return Effect.fail(
      new InvalidPrice({
        price,
        message: `Price outside [${bounds.value.min}, ${bounds.value.max}]`,
      }),
    );
  }
  return Effect.succeed(price);
}

/** Wrap a source with a per-attempt timeout, price validation and bounded
 *  retries for transient failures. */
export function guardSource(source: PriceSource, config: FetcherConfig): PriceSource {
  return {
    id: source.id,
    getPrice: (symbol) =>
      source.getPrice(symbol).pipe(
        Effect.timeoutFail({
          duration: config.sourceTimeout,
          onTimeout: () =>
            new TimeoutError({ message: `${source.id}: request timed out` }),
        }),
        Effect.flatMap((price) => validatePrice(price, config.validation)),
        Effect.retry({
          while: isTransient,
          schedule: Schedule.spaced(config.retryDelay).pipe(
            Schedule.compose(Schedule.recurs(config.retryCount)),
          ),
        }),
      ),
  };
}

// --- Fallback logic ---

export interface SourcedPrice {
  readonly source: LiveSourceId;
  readonly price: number;
}

export function tryPriceSources(
  sources: ReadonlyArray<PriceSource>,
  symbol: string,
  fallbackEnabled: boolean,
): Effect.Effect<SourcedPrice, FetchError> {
  const loop = (
    index: number,
    failures: ReadonlyArray<SourceFailure>,
  ): Effect.Effect<SourcedPrice, FetchError> => {
    if (index >= sources.length || (index > 0 && !fallbackEnabled)) {
      return Effect.fail(fetchError(symbol, failures));
    }

    const { id, getPrice } = sources[index];

    return Console.debug(`[fetcher] ${symbol}: trying ${id}...`).pipe(
      Effect.flatMap(() => getPrice(symbol)),
      Effect.map((price): SourcedPrice => ({ source: id, price })),
      Effect.catchAll((error) =>
        Console.debug(`[fetcher] ${symbol}: ${id} failed: ${error._tag}`).pipe(
          Effect.zipRight(loop(index + 1, [...failures, { source: id, error }])),
        ),
      ),
    );
  };

  return loop(0, []);
}

// --- Service ---

export class PriceFetcher extends Context.Tag("PriceFetcher")<
  PriceFetcher,
  {
    readonly fetchPrice: (
      symbol: string,
    ) => Effect.Effect<PriceQuote, FetchError | StoreError>;
    /** Never fails for a single symbol; only store failures abort. */
    readonly fetchPrices: (
      symbols: Iterable<string>,
    ) => Effect.Effect<PriceReport, StoreError>;
  }
>() {}

interface Outcome {
  readonly symbol: string;
  readonly result: PriceQuote | FetchError;
  readonly warning: Option.Option<PriceWarning>;
}

export const makePriceFetcher = (
  sources: ReadonlyArray<PriceSource>,
  config: FetcherConfig,
) =>
  Effect.gen(function* () {
    const store = yield* PortfolioStore;
    const guarded = sources.map((s) => guardSource(s, config));

    yield* Console.debug(
      `[fetcher] sources in priority order: ${guarded.map((s) => s.id).join(", ") || "(none)"}`,
    );

    const fetchPrice = (symbol: string) =>
      Effect.gen(function* () {
        const { source, price } = yield* tryPriceSources(
          guarded,
          symbol,
          config.fallbackEnabled,
        );
        const timestamp = yield* Clock.currentTimeMillis;
        const quote: PriceQuote = { symbol, price, timestamp, source };
        yield* store.savePrice(quote);
        return quote;
      });

    const degrade = (symbol: string, error: FetchError) =>
      store.getLastPrice(symbol).pipe(
        Effect.map((last) =>
          Option.match(last, {
            onNone: (): Outcome => ({
              symbol,
              result: error,
              warning: Option.some({
                symbol,
                message: `${error.message}; excluded from valuation`,
              }),
            }),
            onSome: (quote): Outcome => ({
              symbol,
              result: { ...quote, source: "cached" },
              warning: Option.some({
                symbol,
                message: `all sources failed; using last known price ${quote.price.toFixed(2)} from ${new Date(quote.timestamp).toISOString()}`,
              }),
            }),
          }),
        ),
        Effect.tap(({ warning }) =>
          Option.isSome(warning)
            ? Console.warn(`[fetcher] ${symbol}: ${warning.value.message}`)
            : Effect.void,
        ),
      );

    const fetchOne = (symbol: string): Effect.Effect<Outcome, StoreError> =>
      fetchPrice(symbol).pipe(
        Effect.map((quote): Outcome => ({
          symbol,
          result: quote,
          warning: Option.none(),
        })),
        Effect.catchTag("FetchError", (error) => degrade(symbol, error)),
      );

    const fetchPrices = (symbols: Iterable<string>) =>
      Effect.forEach(
        Array.from(new Set(symbols)).filter((s) => s.length > 0),
        fetchOne,
        { concurrency: config.concurrency },
      ).pipe(
        Effect.map(
          (outcomes): PriceReport => ({
            prices: new Map(
              outcomes.map((o): [string, PriceQuote | FetchError] => [
                o.symbol,
                o.result,
              ]),
            ),
            warnings: outcomes.flatMap((o) => Option.toArray(o.warning)),
          }),
        ),
      );

    return PriceFetcher.of({ fetchPrice, fetchPrices });
  });

export const PriceFetcherLive = (
  sources: ReadonlyArray<PriceSource>,
  config: FetcherConfig,
) => Layer.effect(PriceFetcher, makePriceFetcher(sources, config));
