import {
  ConditionConfigSchema,
  assertValid,
  type ConditionConfig,
  type ConditionConfigInput,
  type DistributionDayRecord,
  type ISODate,
  type MarketCondition,
  type MarketVerdict,
  type PriceSeries,
} from "@market-sentinel/sdk";

import { resolveAsOf } from "./expiration.js";

export interface AssessmentOptions extends ConditionConfigInput {
  readonly asOf?: ISODate;
}

const VERDICT_LABELS: Record<MarketVerdict, string> = {
  healthy: "Low distribution day pressure; market appears relatively healthy.",
  moderate_pressure: "Moderate distribution day pressure; market showing weakness.",
  high_pressure: "High distribution day pressure; market may be under significant pressure.",
};

export const classifyPressure = (
  totalCount: number,
  recentCount: number,
  totalWeightedChange: number,
  config: ConditionConfig,
): MarketVerdict => {
  if (
    totalCount >= config.highCount ||
    recentCount >= config.recentHighCount ||
    (config.highWeightedChange !== null && totalWeightedChange <= config.highWeightedChange)
  ) {
    return "high_pressure";
  }
  if (
    totalCount >= config.moderateCount ||
    (config.recentModerateCount !== null && recentCount >= config.recentModerateCount) ||
    (config.moderateWeightedChange !== null && totalWeightedChange <= config.moderateWeightedChange)
  ) {
    return "moderate_pressure";
  }
  return "healthy";
};

const formatPercent = (value: number): string => `${(value * 100).toFixed(2)}%`;

/**
 * Aggregates the unexpired distribution days at or before `asOf` into a verdict.
 * Already-filtered subsets and full logs give the same result.
 */
export const assessMarketCondition = (
  records: ReadonlyArray<DistributionDayRecord>,
  series: PriceSeries,
  options: AssessmentOptions = {},
): MarketCondition => {
  const { asOf, ...thresholds } = options;
  const config = assertValid(ConditionConfigSchema, thresholds, "ConditionConfig");
  const resolved = resolveAsOf(series, asOf);
  const asOfIndex = resolved.index;
  const recentFloor = resolved.position - config.recentWindowSessions + 1;

  const activeRecords = records.filter(
    (record) => !record.expired && record.sessionIndex <= asOfIndex,
  );
  const recentCount = activeRecords.filter((record) => record.sessionIndex >= recentFloor).length;
  const totalWeightedChange = activeRecords.reduce((sum, record) => sum + record.weightedChange, 0);
  const totalCount = activeRecords.length;
  const verdict = classifyPressure(totalCount, recentCount, totalWeightedChange, config);

  return {
    asOf: resolved.date,
    totalCount,
    recentCount,
    totalWeightedChange,
    verdict,
    description:
      `${VERDICT_LABELS[verdict]} ` +
      `(Count: ${totalCount}, Recent: ${recentCount}, Weighted Change: ${formatPercent(totalWeightedChange)})`,
    activeRecords,
  };
};
