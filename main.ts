import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Clock, Console, Duration, Effect, Layer } from "effect";
import { AppConfig } from "./src/config.ts";
import { formatHistory, formatStoreError } from "./src/format.ts";
import { parseHolding } from "./src/holding-input.ts";
import { OutboxNotifierLive } from "./src/notifier.ts";
import { PortfolioStore, type StoreError } from "./src/portfolio-store.ts";
import { makePriceFetcher, PriceFetcher } from "./src/price-fetcher.ts";
import { makePriceSources } from "./src/price-sources.ts";
import { runPortfolio } from "./src/run.ts";
import { SqliteStoreLive } from "./src/stores/sqlite-store.ts";

// --- CLI ---

const baseline = Options.choice("baseline", ["cost-basis", "previous-snapshot"]).pipe(
  Options.withDescription("Value to measure performance against"),
  Options.withDefault("cost-basis"),
);

const notify = Options.boolean("notify").pipe(
  Options.withDescription("Dispatch the summary (also enabled by NOTIFY_ENABLED)"),
);

const run = Command.make("run", { baseline, notify }, ({ baseline, notify }) =>
  Effect.gen(function* () {
    const config = yield* AppConfig;
    yield* runPortfolio({
      baseline,
      notify: notify || config.notifications.enabled,
      staleAfter: config.staleAfter,
    });
  }),
).pipe(Command.withDescription("Fetch prices, value the portfolio and report performance"));

const days = Options.integer("days").pipe(
  Options.withDescription("How many days back to show"),
  Options.withDefault(7),
);

const history = Command.make("history", { days }, ({ days }) =>
  Effect.gen(function* () {
    const store = yield* PortfolioStore;
    const now = yield* Clock.currentTimeMillis;
    const snapshots = yield* store.getValuationHistory(
      now - Duration.toMillis(Duration.days(days)),
    );
    yield* Console.log(formatHistory(snapshots));
  }),
).pipe(Command.withDescription("Show recent portfolio valuations"));

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Ticker symbol (e.g. AAPL, INFY.NS)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a ticker symbol:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Symbol cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);
const quantity = Options.float("quantity").pipe(
  Options.withDescription("Number of shares held"),
);
const costBasis = Options.float("cost-basis").pipe(
  Options.withDescription("Total amount paid for the position"),
);

const holding = Command.make(
  "holding",
  { symbol, quantity, costBasis },
  ({ symbol, quantity, costBasis }) =>
    Effect.gen(function* () {
      const store = yield* PortfolioStore;
      const entry = yield* parseHolding({ symbol, quantity, costBasis });
      yield* store.saveHolding(entry);
      yield* Console.log(
        `Saved ${entry.symbol}: ${entry.quantity} shares, cost basis ${entry.costBasis}`,
      );
    }).pipe(
      // Rejected input fails the command so the process exits non-zero.
      Effect.tapErrorTag("InvalidHolding", (e) => Console.error(e.message)),
    ),
).pipe(Command.withDescription("Add or replace a holding"));

const command = Command.make("portfolio").pipe(
  Command.withSubcommands([run, history, holding]),
);

// --- Layers ---

const AppLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* AppConfig;
    const StoreLive = SqliteStoreLive(config.dbPath);

    const FetcherLive = Layer.effect(
      PriceFetcher,
      Effect.gen(function* () {
        const sources = yield* makePriceSources(config);
        return yield* makePriceFetcher(sources, config.fetcher);
      }),
    ).pipe(Layer.provide(FetchHttpClient.layer));

    return Layer.mergeAll(
      FetcherLive,
      OutboxNotifierLive(config.notifications.outboxDir),
    ).pipe(Layer.provideMerge(StoreLive));
  }),
);

// --- Run ---

const cli = Command.run(command, {
  name: "portfolio",
  version: "0.1.0",
});

// A store failure aborts the run; runMain exits non-zero after this message.
const logStoreError = (e: StoreError) => Console.error(formatStoreError(e));

cli(process.argv).pipe(
  Effect.provide(AppLive),
  Effect.tapErrorTag("StoreError", logStoreError),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
