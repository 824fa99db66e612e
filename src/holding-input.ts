// Validation of a holding entered on the command line.

import { Data, Effect } from "effect";
import type { Holding } from "./domain.ts";

export class InvalidHolding extends Data.TaggedError("InvalidHolding")<{
  readonly message: string;
}> {}

export function parseHolding(input: Holding): Effect.Effect<Holding, InvalidHolding> {
  const symbol = input.symbol.trim().toUpperCase();
  if (symbol.length === 0) {
    return Effect.fail(new InvalidHolding({ message: "Symbol cannot be empty" }));
  }
  if (!Number.isFinite(input.quantity) || input.quantity < 0) {
    return Effect.fail(
      new InvalidHolding({ message: `Quantity must be a non-negative number, got ${input.quantity}` }),
    );
  }
  if (!Number.isFinite(input.costBasis) || input.costBasis < 0) {
    return Effect.fail(
      new InvalidHolding({ message: `Cost basis must be a non-negative number, got ${input.costBasis}` }),
    );
  }
  return Effect.succeed({ symbol, quantity: input.quantity, costBasis: input.costBasis });
}
