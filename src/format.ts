// Pure formatting functions: no I/O.

import { Either, Option } from "effect";
import type { BaselineMode, ValuationSnapshot } from "./domain.ts";
import type { HttpError, PriceSourceError } from "./price-source.ts";
import type { StoreError } from "./portfolio-store.ts";
import type { RunSummary } from "./notifier.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Numbers ---

export function money(n: number): string {
  return n.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

export function signedMoney(n: number): string {
  return `${n >= 0 ? "+" : "-"}${money(Math.abs(n))}`;
}

/** Fraction to signed percentage: 0.5 -> "+50.00%". */
export function percent(fraction: number): string {
  const pct = fraction * 100;
  return `${pct >= 0 ? "+" : "-"}${Math.abs(pct).toFixed(2)}%`;
}

export const isoDate = (timestamp: number): string =>
  new Date(timestamp).toISOString().slice(0, 10);

const AGE_UNITS = [
  ["day", 86_400_000],
  ["hour", 3_600_000],
  ["minute", 60_000],
] as const;

/** Age in its largest whole unit: "2 days", "7 hours". */
export function age(ms: number): string {
  for (const [unit, size] of AGE_UNITS) {
    const n = Math.floor(ms / size);
    if (n >= 1) return `${n} ${unit}${n === 1 ? "" : "s"}`;
  }
  return "under a minute";
}

const baselineLabel = (mode: BaselineMode): string =>
  mode === "cost-basis" ? "cost basis" : "previous valuation";

// --- Summary lines shared by console and message output ---

function performanceLine(summary: RunSummary): string {
  return Either.match(summary.performance, {
    onLeft: (e) => `Performance unavailable: ${e.message}`,
    onRight: (p) =>
      `Change: ${signedMoney(p.absoluteGain)} (${percent(p.percentReturn)}) vs ${baselineLabel(summary.baseline)} ${money(p.baselineValue)}`,
  });
}

function holdingLines(summary: RunSummary): string[] {
  return summary.holdings.map((h) => {
    const priced = Option.all({ price: h.price, value: h.marketValue });
    if (Option.isNone(priced)) return `${h.symbol}: no price`;
    const { price, value } = priced.value;
    const source = Option.fromNullable(summary.quotes.get(h.symbol)).pipe(
      Option.match({
        onNone: () => "",
        onSome: (q) => ` [${q.source}, ${isoDate(q.timestamp)}]`,
      }),
    );
    const ret = Option.match(h.percentReturn, {
      onNone: () => "",
      onSome: (r) => ` (${percent(r)})`,
    });
    return `${h.symbol}: ${h.quantity} @ ${money(price)} = ${money(value)}${ret}${source}`;
  });
}

// --- Console summary ---

export function formatSummary(summary: RunSummary): string {
  const perf = summary.performance;
  const color = Either.isRight(perf) && perf.right.absoluteGain < 0 ? RED : GREEN;

  const lines = [
    "",
    `${BOLD}  Portfolio valuation ${isoDate(summary.snapshot.timestamp)}${RESET}`,
    `  ${BOLD}Total value: ${money(summary.snapshot.totalValue)}${RESET}`,
    `  ${Either.isRight(perf) ? color : YELLOW}${performanceLine(summary)}${RESET}`,
    "",
    ...holdingLines(summary).map((l) => `  ${l}`),
  ];

  if (summary.warnings.length > 0) {
    lines.push(
      "",
      `${YELLOW}${BOLD}  Warnings${RESET}`,
      ...summary.warnings.map((w) => `  ${YELLOW}! ${w.symbol}: ${w.message}${RESET}`),
    );
  }

  lines.push("");
  return lines.join("\n");
}

// --- Notification message ---

export interface SummaryMessage {
  readonly subject: string;
  readonly body: string;
}

export function formatMessage(summary: RunSummary, generatedAt: number): SummaryMessage {
  const body = [
    "Portfolio Performance Summary",
    `Total value: ${money(summary.snapshot.totalValue)}`,
    performanceLine(summary),
    "",
    "Holdings:",
    ...holdingLines(summary).map((l) => `  ${l}`),
  ];

  if (summary.warnings.length > 0) {
    body.push(
      "",
      "Warnings:",
      ...summary.warnings.map((w) => `  ${w.symbol}: ${w.message}`),
    );
  }

  body.push("", `Generated on ${new Date(generatedAt).toISOString()}`);

  return {
    subject: `Portfolio Performance Update - ${isoDate(generatedAt)}`,
    body: body.join("\n"),
  };
}

// --- History ---

export function formatHistory(snapshots: ReadonlyArray<ValuationSnapshot>): string {
  if (snapshots.length === 0) return "No valuation history found";
  return snapshots
    .map((s) => `${new Date(s.timestamp).toISOString()}  ${money(s.totalValue)}`)
    .join("\n");
}

// --- Error formatting ---

export function formatStoreError(error: StoreError): string {
  return [
    "",
    `${RED}${BOLD}  ✗ Portfolio store unavailable (${error.operation})${RESET}`,
    `  ${DIM}${error.message}${RESET}`,
    "",
  ].join("\n");
}

/** Short, human-readable reason a price source gave no price. */
export function describeSourceError(error: PriceSourceError): string {
  switch (error._tag) {
    case "NetworkError":
      return "network error";
    case "TimeoutError":
      return "timed out";
    case "HttpError":
      return describeHttpError(error);
    case "SymbolNotFound":
      return "symbol not found";
    case "ServiceError":
      return `service unavailable: ${error.message}`;
    case "ParseError":
      return "unexpected response";
    case "InvalidPrice":
      return `rejected price ${error.price}`;
  }
}

function describeHttpError(error: HttpError): string {
  if (error.status === 404) return "symbol not found";
  if (error.status === 429) return "rate limited";
  if (error.status >= 500 && error.status < 600) return "server error";
  return `HTTP ${error.status}`;
}
