// Notifier: dispatches the run summary.

import { FileSystem, Path } from "@effect/platform";
import { Clock, Console, Context, Data, Effect, type Either, Layer } from "effect";
import type {
  BaselineMode,
  PerformanceRecord,
  PriceQuote,
  ValuationSnapshot,
} from "./domain.ts";
import { formatMessage, isoDate } from "./format.ts";
import type { ComputationError, HoldingPerformance } from "./performance.ts";
import type { PriceWarning } from "./price-fetcher.ts";

export interface RunSummary {
  readonly snapshot: ValuationSnapshot;
  readonly baseline: BaselineMode;
  readonly performance: Either.Either<PerformanceRecord, ComputationError>;
  readonly holdings: ReadonlyArray<HoldingPerformance>;
  readonly quotes: ReadonlyMap<string, PriceQuote>;
  readonly warnings: ReadonlyArray<PriceWarning>;
}

export class NotificationError extends Data.TaggedError("NotificationError")<{
  readonly message: string;
}> {}

export class Notifier extends Context.Tag("Notifier")<
  Notifier,
  {
    /** With `deliver` false nothing is dispatched. */
    readonly notify: (
      summary: RunSummary,
      deliver: boolean,
    ) => Effect.Effect<void, NotificationError>;
  }
>() {}

// --- Outbox ---

/** Writes one message per day into `outboxDir`; a later run on the same day
 *  replaces it. */
export const makeOutboxNotifier = (outboxDir: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const write = (summary: RunSummary) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const message = formatMessage(summary, now);
        const file = path.join(outboxDir, `portfolio-summary-${isoDate(now)}.txt`);

        yield* fs.makeDirectory(outboxDir, { recursive: true });
        yield* fs.writeFileString(
          file,
          `Subject: ${message.subject}\n\n${message.body}\n`,
        );
        yield* Console.log(`Summary written to ${file}`);
      }).pipe(
        Effect.mapError((e) => new NotificationError({ message: e.message })),
      );

    return Notifier.of({
      notify: (summary, deliver) =>
        deliver ? write(summary) : Console.log("Notifications are disabled"),
    });
  });

export const OutboxNotifierLive = (outboxDir: string) =>
  Layer.effect(Notifier, makeOutboxNotifier(outboxDir));
