import type { DistributionAnalysis } from "@market-sentinel/distribution";
import { computeImprovement, type TrendGuardRun } from "@market-sentinel/engine";
import { assertValid } from "@market-sentinel/sdk";
import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Flat summaries handed to the narrative collaborator. Percent fields are
 *  already multiplied by 100 and rounded to two decimals; ratios keep four.
 *  -------------------------------------------------------------------- */

const nullableNumber = z.number().finite().nullable();

export const DistributionSummarySchema = z
  .object({
    symbol: z.string().min(1),
    asOf: z.string(),
    sessionCount: z.number().int().nonnegative(),
    verdict: z.enum(["healthy", "moderate_pressure", "high_pressure"]),
    description: z.string(),
    activeDistributionDays: z.number().int().nonnegative(),
    recentDistributionDays: z.number().int().nonnegative(),
    recentWindowSessions: z.number().int().positive(),
    expiredDistributionDays: z.number().int().nonnegative(),
    rawDistributionDays: z.number().int().nonnegative(),
    activeWeightedChangePct: z.number().finite(),
    totalWeightedChangePct: z.number().finite(),
    averageVolumeIncreasePct: nullableNumber,
    close: z.number().finite(),
    shortMaPeriod: z.number().int().positive(),
    shortMa: nullableNumber,
    longMaPeriod: z.number().int().positive(),
    longMa: nullableNumber,
    rsi: nullableNumber,
    trend: z.string().nullable(),
    momentum: z.string().nullable(),
  })
  .strict();

export const TrendGuardSummarySchema = z
  .object({
    symbol: z.string().min(1),
    periodStart: z.string(),
    periodEnd: z.string(),
    totalMonths: z.number().int().positive(),
    smaLookbackMonths: z.number().int().positive(),
    cashYieldPct: z.number().finite(),
    timeInvestedPct: z.number().finite(),
    buyHoldCagrPct: z.number().finite(),
    buyHoldMaxDrawdownPct: z.number().finite(),
    buyHoldSharpe: nullableNumber,
    strategyCagrPct: z.number().finite(),
    strategyMaxDrawdownPct: z.number().finite(),
    strategySharpe: nullableNumber,
    drawdownReductionPct: nullableNumber,
    cagrDeltaPct: z.number().finite(),
    sharpeDelta: nullableNumber,
  })
  .strict();

export type DistributionSummary = z.infer<typeof DistributionSummarySchema>;
export type TrendGuardSummary = z.infer<typeof TrendGuardSummarySchema>;

export const DISTRIBUTION_SUMMARY_KEYS = Object.keys(DistributionSummarySchema.shape);
export const TREND_GUARD_SUMMARY_KEYS = Object.keys(TrendGuardSummarySchema.shape);

const toFixedNumber = (value: number, digits: number): number => Number(value.toFixed(digits));

export const toPercent = (fraction: number): number => toFixedNumber(fraction * 100, 2);

const toPercentOrNull = (fraction: number | null): number | null =>
  fraction === null ? null : toPercent(fraction);

const toRatio = (value: number): number => toFixedNumber(value, 4);

const toRatioOrNull = (value: number | null): number | null =>
  value === null ? null : toRatio(value);

export const buildDistributionSummary = (analysis: DistributionAnalysis): DistributionSummary => {
  const { condition, technical, statistics, config } = analysis;
  return assertValid(
    DistributionSummarySchema,
    {
      symbol: analysis.symbol,
      asOf: condition.asOf,
      sessionCount: analysis.sessionCount,
      verdict: condition.verdict,
      description: condition.description,
      activeDistributionDays: condition.totalCount,
      recentDistributionDays: condition.recentCount,
      recentWindowSessions: config.distribution.condition.recentWindowSessions,
      expiredDistributionDays: statistics.expiredCount,
      rawDistributionDays: statistics.rawCount,
      activeWeightedChangePct: toPercent(condition.totalWeightedChange),
      totalWeightedChangePct: toPercent(statistics.totalWeightedChange),
      averageVolumeIncreasePct: toPercentOrNull(statistics.averageVolumeIncrease),
      close: toRatio(technical.close),
      shortMaPeriod: config.indicators.shortMaPeriod,
      shortMa: toRatioOrNull(technical.shortMa),
      longMaPeriod: config.indicators.longMaPeriod,
      longMa: toRatioOrNull(technical.longMa),
      rsi: toRatioOrNull(technical.rsi),
      trend: technical.trend,
      momentum: technical.momentum,
    },
    "DistributionSummary",
  );
};

export type TrendGuardOutcome = Pick<TrendGuardRun, "symbol" | "config" | "strategy" | "buyHold">;

export const buildTrendGuardSummary = (run: TrendGuardOutcome): TrendGuardSummary => {
  const { strategy, buyHold, config } = run;
  const improvement = computeImprovement(strategy, buyHold);
  return assertValid(
    TrendGuardSummarySchema,
    {
      symbol: run.symbol,
      periodStart: strategy.periodStart,
      periodEnd: strategy.periodEnd,
      totalMonths: strategy.monthCount,
      smaLookbackMonths: config.smaLookbackMonths,
      cashYieldPct: toPercent(config.cashYield),
      timeInvestedPct: toPercent(strategy.timeInvestedFraction),
      buyHoldCagrPct: toPercent(buyHold.cagr),
      buyHoldMaxDrawdownPct: toPercent(buyHold.maxDrawdown),
      buyHoldSharpe: toRatioOrNull(buyHold.sharpeRatio),
      strategyCagrPct: toPercent(strategy.cagr),
      strategyMaxDrawdownPct: toPercent(strategy.maxDrawdown),
      strategySharpe: toRatioOrNull(strategy.sharpeRatio),
      drawdownReductionPct: toPercentOrNull(improvement.drawdownReduction),
      cagrDeltaPct: toPercent(improvement.cagrDelta),
      sharpeDelta: toRatioOrNull(improvement.sharpeDelta),
    },
    "TrendGuardSummary",
  );
};
