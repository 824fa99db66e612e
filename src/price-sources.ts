// Builds the configured price sources in priority order.

import type { HttpClient } from "@effect/platform";
import { Array as Arr, Console, Effect, Option } from "effect";
import type { AppConfig } from "./config.ts";
import type { LiveSourceId } from "./domain.ts";
import type { PriceSource } from "./price-source.ts";
import { makeAlphaVantageSource } from "./providers/alpha-vantage.ts";
import { makeSampleSource } from "./providers/sample.ts";
import { makeYahooFinanceSource } from "./providers/yahoo-finance.ts";

export const makePriceSources = (
  config: AppConfig,
): Effect.Effect<ReadonlyArray<PriceSource>, never, HttpClient.HttpClient> => {
  const build = (
    id: LiveSourceId,
  ): Effect.Effect<Option.Option<PriceSource>, never, HttpClient.HttpClient> => {
    switch (id) {
      case "yahoo":
        return makeYahooFinanceSource(config.yahooBaseUrl).pipe(
          Effect.map(Option.some),
        );
      case "alphavantage":
        return Option.match(config.alphaVantage.apiKey, {
          // Alpha Vantage requires an API key; skip it when not configured.
          onNone: () =>
            Console.warn(
              "[sources] ALPHA_VANTAGE_API_KEY not set, skipping alphavantage",
            ).pipe(Effect.as(Option.none())),
          onSome: (apiKey) =>
            makeAlphaVantageSource({
              baseUrl: config.alphaVantage.baseUrl,
              apiKey,
            }).pipe(Effect.map(Option.some)),
        });
      case "sample":
        return Effect.succeed(Option.some(makeSampleSource()));
    }
  };

  return Effect.forEach(Arr.dedupe(config.sources), build).pipe(
    Effect.map(Arr.getSomes),
  );
};
