// SQLite-backed PortfolioStore (better-sqlite3).

import Database from "better-sqlite3";
import { Effect, Either, Layer, Option, Schema } from "effect";
import type { Holding, PriceQuote, ValuationSnapshot } from "../domain.ts";
import { PortfolioStore, StoreError } from "../portfolio-store.ts";

export type Db = Database.Database;

export function openDb(dbPath: string): Db {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  return db;
}

export function migrate(db: Db) {
  db.exec(`
    create table if not exists holdings (
      symbol text primary key,
      quantity real not null,
      cost_basis real not null,
      updated_at text not null default (datetime('now'))
    );

    create table if not exists prices (
      symbol text not null,
      price real not null,
      source text not null,
      fetched_at integer not null, -- epoch ms
      primary key(symbol, fetched_at)
    );

    create table if not exists valuations (
      id integer primary key autoincrement,
      taken_at integer not null, -- epoch ms
      total_value real not null,
      per_holding_json text not null
    );

    create index if not exists valuations_taken_at on valuations(taken_at);
  `);
}

// --- Rows ---

type HoldingRow = { symbol: string; quantity: number; cost_basis: number };
type PriceRow = { symbol: string; price: number; source: string; fetched_at: number };
type ValuationRow = { taken_at: number; total_value: number; per_holding_json: string };

const PriceSourceId = Schema.Literal("yahoo", "alphavantage", "sample", "cached");
const PerHoldingJson = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Number }),
);

const toQuote = (row: PriceRow): Either.Either<PriceQuote, string> =>
  Schema.decodeUnknownEither(PriceSourceId)(row.source).pipe(
    Either.map((source) => ({
      symbol: row.symbol,
      price: row.price,
      timestamp: row.fetched_at,
      source,
    })),
    Either.mapLeft(() => `unknown price source '${row.source}'`),
  );

const toSnapshot = (row: ValuationRow): Either.Either<ValuationSnapshot, string> =>
  Schema.decodeUnknownEither(PerHoldingJson)(row.per_holding_json).pipe(
    Either.map((perHolding) => ({
      timestamp: row.taken_at,
      totalValue: row.total_value,
      perHolding,
    })),
    Either.mapLeft((e) => `corrupt valuation row: ${e.message}`),
  );

// --- Store ---

export const makeSqliteStore = (db: Db) => {
  // Every statement is synchronous; failures become StoreError at this boundary.
  const attempt = <A>(operation: string, f: () => A) =>
    Effect.try({
      try: f,
      catch: (e) => new StoreError({ operation, message: String(e) }),
    });

  const decoded = <A>(
    operation: string,
    result: Either.Either<A, string>,
  ): Effect.Effect<A, StoreError> =>
    Either.isRight(result)
      ? Effect.succeed(result.right)
      : Effect.fail(new StoreError({ operation, message: result.left }));

  const holdingsStmt = db.prepare<[], HoldingRow>(
    "select symbol, quantity, cost_basis from holdings order by symbol asc",
  );
  const symbolsStmt = db.prepare<[], { symbol: string }>(
    "select distinct symbol from holdings",
  );
  const upsertHolding = db.prepare<[string, number, number]>(
    "insert into holdings(symbol, quantity, cost_basis) values (?, ?, ?) on conflict(symbol) do update set quantity=excluded.quantity, cost_basis=excluded.cost_basis, updated_at=datetime('now')",
  );
  const insertPrice = db.prepare<[string, number, string, number]>(
    "insert into prices(symbol, price, source, fetched_at) values (?, ?, ?, ?) on conflict(symbol, fetched_at) do update set price=excluded.price, source=excluded.source",
  );
  const lastPriceStmt = db.prepare<[string], PriceRow>(
    "select symbol, price, source, fetched_at from prices where symbol = ? order by fetched_at desc limit 1",
  );
  const insertValuation = db.prepare<[number, number, string]>(
    "insert into valuations(taken_at, total_value, per_holding_json) values (?, ?, ?)",
  );
  const latestValuationStmt = db.prepare<[], ValuationRow>(
    "select taken_at, total_value, per_holding_json from valuations order by taken_at desc, id desc limit 1",
  );
  const historyStmt = db.prepare<[number], ValuationRow>(
    "select taken_at, total_value, per_holding_json from valuations where taken_at >= ? order by taken_at desc, id desc",
  );

  return PortfolioStore.of({
    getHoldings: attempt("getHoldings", () => holdingsStmt.all()).pipe(
      Effect.map((rows) =>
        rows.map(
          (r): Holding => ({
            symbol: r.symbol,
            quantity: r.quantity,
            costBasis: r.cost_basis,
          }),
        ),
      ),
    ),
    getSymbols: attempt("getSymbols", () => symbolsStmt.all()).pipe(
      Effect.map((rows) => new Set(rows.map((r) => r.symbol))),
    ),
    saveHolding: (holding) =>
      attempt("saveHolding", () => {
        upsertHolding.run(holding.symbol, holding.quantity, holding.costBasis);
      }),

    savePrice: (quote) =>
      attempt("savePrice", () => {
        insertPrice.run(quote.symbol, quote.price, quote.source, quote.timestamp);
      }),
    getLastPrice: (symbol) =>
      attempt("getLastPrice", () => lastPriceStmt.get(symbol)).pipe(
        Effect.flatMap((row) =>
          row === undefined
            ? Effect.succeed(Option.none())
            : decoded("getLastPrice", toQuote(row)).pipe(Effect.map(Option.some)),
        ),
      ),

    saveValuation: (snapshot) =>
      attempt("saveValuation", () => {
        insertValuation.run(
          snapshot.timestamp,
          snapshot.totalValue,
          JSON.stringify(snapshot.perHolding),
        );
      }),
    getLatestValuation: attempt("getLatestValuation", () =>
      latestValuationStmt.get(),
    ).pipe(
      Effect.flatMap((row) =>
        row === undefined
          ? Effect.succeed(Option.none())
          : decoded("getLatestValuation", toSnapshot(row)).pipe(
              Effect.map(Option.some),
            ),
      ),
    ),
    getValuationHistory: (since) =>
      attempt("getValuationHistory", () => historyStmt.all(since)).pipe(
        Effect.flatMap((rows) =>
          Effect.forEach(rows, (row) =>
            decoded("getValuationHistory", toSnapshot(row)),
          ),
        ),
      ),
  });
};

/** Opens the database for the lifetime of the layer's scope. */
export const SqliteStoreLive = (dbPath: string) =>
  Layer.scoped(
    PortfolioStore,
    Effect.acquireRelease(
      Effect.try({
        try: () => {
          const db = openDb(dbPath);
          migrate(db);
          return db;
        },
        catch: (e) => new StoreError({ operation: "open", message: String(e) }),
      }),
      (db) => Effect.sync(() => db.close()),
    ).pipe(Effect.map(makeSqliteStore)),
  );
