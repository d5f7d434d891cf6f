import { strict as assert } from "node:assert";
import test from "node:test";

import { createLogger, type LogLevel } from "@market-sentinel/logger";
import {
  ConfigurationError,
  InsufficientHistoryError,
  type BacktestResult,
  type PriceSeries,
} from "@market-sentinel/sdk";

import {
  compareTrendGuard,
  computeImprovement,
  runTrendGuardComparison,
  sortComparisonRows,
  type ComparisonRow,
} from "../src/comparison.js";
import { crashAndRecovery, monthlySeries, steadyRise } from "./fixtures.js";

const captureLogger = () => {
  const entries: Array<{ level: LogLevel; entry: Record<string, unknown> }> = [];
  const logger = createLogger("engine/comparison", {
    level: "debug",
    sink: (level, line) => {
      entries.push({ level, entry: JSON.parse(line) });
    },
  });
  return { entries, logger };
};

const resultWith = (overrides: Partial<BacktestResult>): BacktestResult => ({
  cagr: 0.05,
  maxDrawdown: -0.5,
  sharpeRatio: 0.4,
  timeInvestedFraction: 1,
  totalReturn: 1,
  finalEquity: 2,
  periodStart: "2001-01-28",
  periodEnd: "2020-12-28",
  monthCount: 240,
  ...overrides,
});

const okRow = (symbol: string, cagrDelta: number, drawdownReduction: number | null): ComparisonRow => ({
  status: "ok",
  symbol,
  strategy: resultWith({}),
  buyHold: resultWith({}),
  drawdownReduction,
  cagrDelta,
  sharpeDelta: 0,
});

const errorRow = (symbol: string): ComparisonRow => ({
  status: "error",
  symbol,
  error: { code: "insufficient_history", message: "short" },
});

const rising = monthlySeries(steadyRise(36), "RISE");
const crash = monthlySeries(crashAndRecovery(), "CRASH");
const short = monthlySeries(steadyRise(6), "SHORT");

test("computeImprovement reports drawdown reduction and deltas", () => {
  const improvement = computeImprovement(
    resultWith({ maxDrawdown: -0.2, cagr: 0.07, sharpeRatio: 0.9 }),
    resultWith({ maxDrawdown: -0.5, cagr: 0.08, sharpeRatio: 0.5 }),
  );

  assert.ok(Math.abs((improvement.drawdownReduction ?? Number.NaN) - 0.6) < 1e-12);
  assert.ok(Math.abs(improvement.cagrDelta - -0.01) < 1e-12);
  assert.ok(Math.abs((improvement.sharpeDelta ?? Number.NaN) - 0.4) < 1e-12);
});

test("sharpe delta is unavailable when either ratio is", () => {
  assert.equal(computeImprovement(resultWith({ sharpeRatio: null }), resultWith({})).sharpeDelta, null);
  assert.equal(computeImprovement(resultWith({}), resultWith({ sharpeRatio: null })).sharpeDelta, null);
});

test("drawdown reduction is undefined when buy-and-hold never drew down", () => {
  const improvement = computeImprovement(resultWith({ maxDrawdown: 0 }), resultWith({ maxDrawdown: 0 }));
  assert.equal(improvement.drawdownReduction, null);
});

test("compareTrendGuard keeps input order and isolates failures", () => {
  const { entries, logger } = captureLogger();
  const rows = compareTrendGuard([crash, short, rising], { logger });

  assert.deepEqual(
    rows.map((row) => [row.symbol, row.status]),
    [
      ["CRASH", "ok"],
      ["SHORT", "error"],
      ["RISE", "ok"],
    ],
  );

  const crashRow = rows[0];
  assert.ok(crashRow.status === "ok");
  assert.ok(crashRow.drawdownReduction !== null && crashRow.drawdownReduction > 0);

  const risingRow = rows[2];
  assert.ok(risingRow.status === "ok");
  assert.equal(risingRow.drawdownReduction, null);
  assert.equal(risingRow.cagrDelta, 0);
  assert.equal(risingRow.sharpeDelta, 0);

  const shortRow = rows[1];
  assert.ok(shortRow.status === "error");
  assert.equal(shortRow.error.code, "insufficient_history");

  const warnings = entries.filter((item) => item.level === "warn");
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0].entry.symbol, "SHORT");
  assert.equal(warnings[0].entry.code, "insufficient_history");
  assert.equal(entries.filter((item) => item.level === "info").length, 2);
});

test("sortComparisonRows sorts descending and keeps error rows last", () => {
  const rows = [errorRow("E1"), okRow("A", 0.01, 0.2), okRow("B", 0.03, null), errorRow("E2"), okRow("C", -0.02, 0.5)];

  assert.deepEqual(
    sortComparisonRows(rows, "cagrDelta").map((row) => row.symbol),
    ["B", "A", "C", "E1", "E2"],
  );
  assert.deepEqual(
    sortComparisonRows(rows, "drawdownReduction").map((row) => row.symbol),
    ["C", "A", "B", "E1", "E2"],
  );
  assert.deepEqual(
    sortComparisonRows(rows).map((row) => row.symbol),
    ["E1", "A", "B", "E2", "C"],
  );
});

test("compareTrendGuard applies sortBy", () => {
  const { logger } = captureLogger();
  const rows = compareTrendGuard([short, rising, crash], { logger, sortBy: "drawdownReduction" });

  assert.deepEqual(
    rows.map((row) => row.symbol),
    ["CRASH", "RISE", "SHORT"],
  );
});

test("an invalid configuration fails the whole comparison", () => {
  assert.throws(() => compareTrendGuard([rising], { config: { cashYield: 5 } }), ConfigurationError);
});

test("runTrendGuardComparison joins concurrent loads in input order", async () => {
  const { entries, logger } = captureLogger();
  const available = new Map<string, PriceSeries>([
    ["CRASH", crash],
    ["RISE", rising],
  ]);
  const delays = new Map([
    ["CRASH", 15],
    ["MISSING", 5],
    ["RISE", 0],
  ]);
  const loadSeries = async (symbol: string): Promise<PriceSeries> => {
    await new Promise((resolve) => setTimeout(resolve, delays.get(symbol) ?? 0));
    const series = available.get(symbol);
    if (!series) {
      throw new InsufficientHistoryError(`No dataset for ${symbol}`, 1, 0);
    }
    return series;
  };

  const rows = await runTrendGuardComparison(["CRASH", "MISSING", "RISE"], loadSeries, { logger });

  assert.deepEqual(
    rows.map((row) => [row.symbol, row.status]),
    [
      ["CRASH", "ok"],
      ["MISSING", "error"],
      ["RISE", "ok"],
    ],
  );
  const missing = rows[1];
  assert.ok(missing.status === "error");
  assert.deepEqual(missing.error, { code: "insufficient_history", message: "No dataset for MISSING" });
  assert.equal(entries.filter((item) => item.level === "warn").length, 1);
});

test("runTrendGuardComparison rejects an invalid configuration", async () => {
  await assert.rejects(
    runTrendGuardComparison(["RISE"], async () => rising, { config: { smaLookbackMonths: 0 } }),
    ConfigurationError,
  );
});
