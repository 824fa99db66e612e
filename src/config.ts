// Application configuration, read once from the environment and handed to
// each component explicitly.

import { Config, Duration, Option, type Redacted } from "effect";
import type { LiveSourceId } from "./domain.ts";
import type { FetcherConfig } from "./price-fetcher.ts";
import { ALPHA_VANTAGE_BASE_URL } from "./providers/alpha-vantage.ts";
import { YAHOO_BASE_URL } from "./providers/yahoo-finance.ts";

export interface AppConfig {
  readonly dbPath: string;
  /** Priority order, first is tried first. */
  readonly sources: ReadonlyArray<LiveSourceId>;
  readonly yahooBaseUrl: string;
  readonly alphaVantage: {
    readonly baseUrl: string;
    readonly apiKey: Option.Option<Redacted.Redacted<string>>;
  };
  readonly fetcher: FetcherConfig;
  readonly staleAfter: Duration.Duration;
  readonly notifications: {
    readonly enabled: boolean;
    readonly outboxDir: string;
  };
}

const sources = Config.array(
  Config.literal("yahoo", "alphavantage", "sample")(),
  "PRICE_SOURCES",
).pipe(Config.withDefault(["yahoo", "alphavantage"]));

const validation = Config.all({
  enabled: Config.boolean("PRICE_VALIDATION_ENABLED").pipe(Config.withDefault(true)),
  min: Config.number("PRICE_MIN").pipe(Config.withDefault(0)),
  max: Config.number("PRICE_MAX").pipe(Config.withDefault(1_000_000)),
}).pipe(
  Config.map(({ enabled, min, max }) =>
    enabled ? Option.some({ min, max }) : Option.none(),
  ),
);

const fetcher: Config.Config<FetcherConfig> = Config.all({
  retryCount: Config.integer("PRICE_RETRY_COUNT").pipe(Config.withDefault(1)),
  retryDelay: Config.duration("PRICE_RETRY_DELAY").pipe(
    Config.withDefault(Duration.seconds(1)),
  ),
  sourceTimeout: Config.duration("PRICE_SOURCE_TIMEOUT").pipe(
    Config.withDefault(Duration.seconds(5)),
  ),
  fallbackEnabled: Config.boolean("PRICE_FALLBACK_ENABLED").pipe(
    Config.withDefault(true),
  ),
  validation,
  concurrency: Config.integer("PRICE_CONCURRENCY").pipe(Config.withDefault(1)),
});

export const AppConfig: Config.Config<AppConfig> = Config.all({
  dbPath: Config.string("PORTFOLIO_DB_PATH").pipe(
    Config.withDefault("./portfolio.sqlite"),
  ),
  sources,
  yahooBaseUrl: Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault(YAHOO_BASE_URL),
  ),
  alphaVantage: Config.all({
    baseUrl: Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
      Config.withDefault(ALPHA_VANTAGE_BASE_URL),
    ),
    apiKey: Config.option(Config.redacted("ALPHA_VANTAGE_API_KEY")),
  }),
  fetcher,
  staleAfter: Config.duration("PRICE_STALE_AFTER").pipe(
    Config.withDefault(Duration.days(1)),
  ),
  notifications: Config.all({
    enabled: Config.boolean("NOTIFY_ENABLED").pipe(Config.withDefault(false)),
    outboxDir: Config.string("NOTIFY_OUTBOX_DIR").pipe(
      Config.withDefault("./outbox"),
    ),
  }),
});
