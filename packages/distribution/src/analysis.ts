import {
  describeError,
  resolveAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigInput,
  type AnalysisErrorCode,
  type DistributionDayRecord,
  type ISODate,
  type MarketCondition,
  type MarketVerdict,
  type PriceSeries,
} from "@market-sentinel/sdk";

import { assessMarketCondition } from "./condition.js";
import { detectDistributionDays } from "./detector.js";
import { applyExpiration, resolveAsOfIndex } from "./expiration.js";
import { computeTechnicalSnapshot, type TechnicalSnapshot } from "./indicators.js";

export interface DistributionStatistics {
  readonly rawCount: number;
  readonly expiredCount: number;
  /** Sum of weightedChange over every detected day, expired or not. */
  readonly totalWeightedChange: number;
  /** Mean volumeChange over detected days; `null` when none were found. */
  readonly averageVolumeIncrease: number | null;
}

export interface DistributionAnalysis {
  readonly symbol: string;
  readonly sessionCount: number;
  readonly config: AnalysisConfig;
  readonly records: ReadonlyArray<DistributionDayRecord>;
  readonly condition: MarketCondition;
  readonly technical: TechnicalSnapshot;
  readonly statistics: DistributionStatistics;
}

export interface DistributionAnalysisOptions {
  readonly asOf?: ISODate;
  readonly config?: AnalysisConfigInput;
}

/**
 * Detector, expiration filter, assessor and technical snapshot for one series.
 * Statistics and indicators only see sessions up to `asOf`; `records` is the
 * full log.
 */
export const analyzeDistribution = (
  series: PriceSeries,
  options: DistributionAnalysisOptions = {},
): DistributionAnalysis => {
  const config = resolveAnalysisConfig(options.config);
  const { qualification, expiration, condition } = config.distribution;

  const detected = detectDistributionDays(series, qualification);
  const records = applyExpiration(detected, series, { ...expiration, asOf: options.asOf });
  const assessed = assessMarketCondition(records, series, { ...condition, asOf: options.asOf });

  const asOfIndex = resolveAsOfIndex(series, options.asOf);
  const observed = records.filter((record) => record.sessionIndex <= asOfIndex);
  const totalWeightedChange = observed.reduce((sum, record) => sum + record.weightedChange, 0);
  const averageVolumeIncrease =
    observed.length === 0
      ? null
      : observed.reduce((sum, record) => sum + record.volumeChange, 0) / observed.length;

  return {
    symbol: series.symbol,
    sessionCount: series.bars.length,
    config,
    records,
    condition: assessed,
    technical: computeTechnicalSnapshot(
      { symbol: series.symbol, bars: series.bars.slice(0, asOfIndex + 1) },
      config.indicators,
    ),
    statistics: {
      rawCount: observed.length,
      expiredCount: observed.filter((record) => record.expired).length,
      totalWeightedChange,
      averageVolumeIncrease,
    },
  };
};

export type BreadthRow =
  | { readonly status: "ok"; readonly symbol: string; readonly analysis: DistributionAnalysis }
  | {
      readonly status: "error";
      readonly symbol: string;
      readonly error: { readonly code: AnalysisErrorCode | "unknown"; readonly message: string };
    };

export interface MarketBreadth {
  readonly rows: ReadonlyArray<BreadthRow>;
  readonly verdicts: Readonly<Record<MarketVerdict, number>>;
  readonly failed: number;
}

/**
 * Runs {@link analyzeDistribution} independently per series and tallies verdicts.
 * A failing series becomes an error row; the others are unaffected.
 */
export const analyzeBreadth = (
  seriesList: ReadonlyArray<PriceSeries>,
  options: DistributionAnalysisOptions = {},
): MarketBreadth => {
  const rows = seriesList.map((series): BreadthRow => {
    try {
      return { status: "ok", symbol: series.symbol, analysis: analyzeDistribution(series, options) };
    } catch (error) {
      return { status: "error", symbol: series.symbol, error: describeError(error) };
    }
  });

  const verdicts: Record<MarketVerdict, number> = {
    healthy: 0,
    moderate_pressure: 0,
    high_pressure: 0,
  };
  let failed = 0;
  for (const row of rows) {
    if (row.status === "ok") {
      verdicts[row.analysis.condition.verdict] += 1;
    } else {
      failed += 1;
    }
  }

  return { rows, verdicts, failed };
};
