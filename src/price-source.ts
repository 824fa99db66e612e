// Price sources: adapter contract and source errors.

import { Data, type Effect } from "effect";
import type { LiveSourceId } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class TimeoutError extends Data.TaggedError("TimeoutError")<{
  readonly message: string;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export class InvalidPrice extends Data.TaggedError("InvalidPrice")<{
  readonly price: number;
  readonly message: string;
}> {}

export type PriceSourceError =
  | NetworkError
  | HttpError
  | TimeoutError
  | ParseError
  | SymbolNotFound
  | ServiceError
  | InvalidPrice;

// --- Adapter ---

/** One external quote provider. Resolves to the last traded price. */
export interface PriceSource {
  readonly id: LiveSourceId;
  readonly getPrice: (symbol: string) => Effect.Effect<number, PriceSourceError>;
}

/** Failures worth another attempt against the same source. Everything else
 *  is a definite answer from that source and moves on to the next one. */
export function isTransient(e: PriceSourceError): boolean {
  switch (e._tag) {
    case "NetworkError":
    case "TimeoutError":
    case "ServiceError":
      return true;
    case "HttpError":
      return e.status >= 500;
    case "ParseError":
    case "SymbolNotFound":
    case "InvalidPrice":
      return false;
  }
}
