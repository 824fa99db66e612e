// Yahoo Finance chart endpoint as a PriceSource.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Effect, Schema } from "effect";
import {
  HttpError,
  NetworkError,
  ParseError,
  type PriceSource,
  SymbolNotFound,
} from "../price-source.ts";

export const YAHOO_BASE_URL = "https://query1.finance.yahoo.com/v8/finance/chart";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.Number,
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(Schema.Struct({ meta: YahooMeta }))),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

// --- Decode Yahoo response into a price ---

export function decodeYahooResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<number, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap(({ chart }) => {
      if (chart.error !== null || chart.result === null) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      const first = chart.result[0];
      return first === undefined
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed(first.meta.regularMarketPrice);
    }),
  );
}

// --- Source ---

export const makeYahooFinanceSource = (
  baseUrl: string,
): Effect.Effect<PriceSource, never, HttpClient.HttpClient> =>
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
      ),
    );

    return {
      id: "yahoo",
      getPrice: (symbol: string) =>
        Effect.gen(function* () {
          const response = yield* client.get(
            `${baseUrl}/${encodeURIComponent(symbol)}`,
          );
          const json = yield* response.json;
          return yield* decodeYahooResponse(json, symbol);
        }).pipe(
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            ResponseError: (e) =>
              e.reason === "StatusCode"
                ? Effect.fail(new HttpError({ status: e.response.status }))
                : Effect.fail(
                    new ParseError({
                      message: `JSON parse failed: ${e.message}`,
                    }),
                  ),
          }),
        ),
    } satisfies PriceSource;
  });
