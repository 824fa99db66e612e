import { ConfigProvider, Duration, Effect, Either, Option, Redacted } from "effect";
import { assert, test } from "vitest";
import { AppConfig } from "./config.ts";

// --- Helpers ---

function load(env: Record<string, string>) {
  return Effect.runPromise(
    Effect.either(
      AppConfig.pipe(
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
      ),
    ),
  );
}

// --- AppConfig ---

test("AppConfig: defaults when the environment is empty", async () => {
  const config = Either.getOrThrow(await load({}));

  assert.strictEqual(config.dbPath, "./portfolio.sqlite");
  assert.deepStrictEqual(config.sources, ["yahoo", "alphavantage"]);
  assert.strictEqual(Option.isNone(config.alphaVantage.apiKey), true);
  assert.strictEqual(config.fetcher.retryCount, 1);
  assert.strictEqual(config.fetcher.fallbackEnabled, true);
  assert.strictEqual(config.fetcher.concurrency, 1);
  assert.deepStrictEqual(config.fetcher.validation, Option.some({ min: 0, max: 1_000_000 }));
  assert.strictEqual(Duration.toMillis(config.staleAfter), 86_400_000);
  assert.deepStrictEqual(config.notifications, { enabled: false, outboxDir: "./outbox" });
});

test("AppConfig: environment overrides", async () => {
  const config = Either.getOrThrow(
    await load({
      PORTFOLIO_DB_PATH: "/var/lib/portfolio.sqlite",
      PRICE_SOURCES: "sample,yahoo",
      ALPHA_VANTAGE_API_KEY: "test-secret",
      PRICE_RETRY_COUNT: "3",
      PRICE_RETRY_DELAY: "250 millis",
      PRICE_FALLBACK_ENABLED: "false",
      PRICE_VALIDATION_ENABLED: "false",
      NOTIFY_ENABLED: "true",
    }),
  );

  assert.strictEqual(config.dbPath, "/var/lib/portfolio.sqlite");
  assert.deepStrictEqual(config.sources, ["sample", "yahoo"]);
  assert.deepStrictEqual(
    Option.map(config.alphaVantage.apiKey, Redacted.value),
    Option.some("test-secret"),
  );
  assert.strictEqual(config.fetcher.retryCount, 3);
  assert.strictEqual(Duration.toMillis(config.fetcher.retryDelay), 250);
  assert.strictEqual(config.fetcher.fallbackEnabled, false);
  assert.strictEqual(Option.isNone(config.fetcher.validation), true);
  assert.strictEqual(config.notifications.enabled, true);
});

test("AppConfig: custom price bounds", async () => {
  const config = Either.getOrThrow(await load({ PRICE_MIN: "1", PRICE_MAX: "5000" }));
  assert.deepStrictEqual(config.fetcher.validation, Option.some({ min: 1, max: 5000 }));
});

test("AppConfig: unknown price source is rejected", async () => {
  const result = await load({ PRICE_SOURCES: "yahoo,bloomberg" });
  assert.strictEqual(Either.isLeft(result), true);
});
