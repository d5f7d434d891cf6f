import { strict as assert } from "node:assert";
import test from "node:test";

import { ConfigurationError } from "@market-sentinel/sdk";

import {
  DISTRIBUTION_SUMMARY_KEYS,
  DistributionSummarySchema,
  TREND_GUARD_SUMMARY_KEYS,
  buildDistributionSummary,
  buildTrendGuardSummary,
  toPercent,
} from "../src/summary.js";
import { fallingRun, sampleAnalysis } from "./fixtures.js";

test("buildDistributionSummary flattens an analysis into the documented keys", () => {
  const summary = buildDistributionSummary(sampleAnalysis());

  assert.deepEqual(Object.keys(summary).sort(), [...DISTRIBUTION_SUMMARY_KEYS].sort());
  assert.deepEqual(summary, {
    symbol: "SAMPLE",
    asOf: "2024-01-05",
    sessionCount: 5,
    verdict: "healthy",
    description:
      "Low distribution day pressure; market appears relatively healthy. " +
      "(Count: 2, Recent: 2, Weighted Change: -3.29%)",
    activeDistributionDays: 2,
    recentDistributionDays: 2,
    recentWindowSessions: 10,
    expiredDistributionDays: 0,
    rawDistributionDays: 2,
    activeWeightedChangePct: -3.29,
    totalWeightedChangePct: -3.29,
    averageVolumeIncreasePct: 9.17,
    close: 97,
    shortMaPeriod: 50,
    shortMa: null,
    longMaPeriod: 200,
    longMa: null,
    rsi: null,
    trend: null,
    momentum: null,
  });
});

test("buildTrendGuardSummary reports both strategies and the improvement", () => {
  const summary = buildTrendGuardSummary(fallingRun());

  assert.deepEqual(Object.keys(summary).sort(), [...TREND_GUARD_SUMMARY_KEYS].sort());
  assert.deepEqual(summary, {
    symbol: "FALL",
    periodStart: "2020-12-28",
    periodEnd: "2021-02-28",
    totalMonths: 2,
    smaLookbackMonths: 12,
    cashYieldPct: 3,
    timeInvestedPct: 50,
    buyHoldCagrPct: -73.79,
    buyHoldMaxDrawdownPct: -20,
    buyHoldSharpe: -47.6426,
    strategyCagrPct: -46.05,
    strategyMaxDrawdownPct: -10,
    strategySharpe: -2.4495,
    drawdownReductionPct: 50,
    cagrDeltaPct: 27.73,
    sharpeDelta: 45.1931,
  });
});

test("summary schemas reject keys outside the documented set", () => {
  const summary = buildDistributionSummary(sampleAnalysis());
  const parsed = DistributionSummarySchema.safeParse({ ...summary, extra: 1 });
  assert.equal(parsed.success, false);
});

test("summaries with non-finite metrics fail validation", () => {
  const run = fallingRun();
  assert.throws(
    () => buildTrendGuardSummary({ ...run, strategy: { ...run.strategy, sharpeRatio: Number.NaN } }),
    ConfigurationError,
  );
});

test("unavailable Sharpe ratios stay null in the summary", () => {
  const run = fallingRun();
  const summary = buildTrendGuardSummary({ ...run, strategy: { ...run.strategy, sharpeRatio: null } });

  assert.equal(summary.strategySharpe, null);
  assert.equal(summary.buyHoldSharpe, -47.6426);
  assert.equal(summary.sharpeDelta, null);
});

test("toPercent rounds to two decimals", () => {
  assert.equal(toPercent(0.123456), 12.35);
  assert.equal(toPercent(-0.5), -50);
});
