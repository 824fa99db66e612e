// Alpha Vantage GLOBAL_QUOTE as a PriceSource.

import { HttpClient } from "@effect/platform";
import { Effect, Redacted, Schema } from "effect";
import {
  HttpError,
  NetworkError,
  ParseError,
  type PriceSource,
  ServiceError,
  SymbolNotFound,
} from "../price-source.ts";

export const ALPHA_VANTAGE_BASE_URL = "https://www.alphavantage.co/query";

// --- Alpha Vantage response schema ---

// Service-level errors come back with HTTP 200 and one of these fields.
const AlphaVantageEnvelope = Schema.Struct({
  "Error Message": Schema.optional(Schema.String),
  Note: Schema.optional(Schema.String),
  Information: Schema.optional(Schema.String),
  "Global Quote": Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.String }),
  ),
});

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.String,
});

// --- Decode Alpha Vantage response into a price ---

export function decodeAlphaVantageResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<number, ParseError | SymbolNotFound | ServiceError> {
  return Schema.decodeUnknown(AlphaVantageEnvelope)(json).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap(
      (envelope): Effect.Effect<number, ParseError | SymbolNotFound | ServiceError> => {
      const notice =
        envelope["Error Message"] ?? envelope.Note ?? envelope.Information;
      if (notice !== undefined) {
        return Effect.fail(new ServiceError({ message: notice }));
      }

      const globalQuote = envelope["Global Quote"];
      if (globalQuote === undefined || Object.keys(globalQuote).length === 0) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }

      return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
        Effect.mapError(
          (e) => new ParseError({ message: `Invalid quote: ${e.message}` }),
        ),
        Effect.flatMap((q) => {
          const price = Number(q["05. price"]);
          return Number.isNaN(price)
            ? Effect.fail(
                new ParseError({ message: "Non-numeric value in quote data" }),
              )
            : Effect.succeed(price);
        }),
      );
    }),
  );
}

// --- Source ---

export interface AlphaVantageOptions {
  readonly baseUrl: string;
  readonly apiKey: Redacted.Redacted<string>;
}

export const makeAlphaVantageSource = (
  options: AlphaVantageOptions,
): Effect.Effect<PriceSource, never, HttpClient.HttpClient> =>
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const apiKey = Redacted.value(options.apiKey);

    return {
      id: "alphavantage",
      getPrice: (symbol: string) =>
        Effect.gen(function* () {
          const url =
            `${options.baseUrl}?function=GLOBAL_QUOTE&symbol=${encodeURIComponent(symbol)}&apikey=${apiKey}`;
          const response = yield* client.get(url);
          const json = yield* response.json;
          return yield* decodeAlphaVantageResponse(json, symbol);
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
