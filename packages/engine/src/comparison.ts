import { createLogger, type Logger } from "@market-sentinel/logger";
import {
  TrendGuardConfigSchema,
  assertValid,
  describeError,
  type AnalysisErrorCode,
  type BacktestResult,
  type PriceSeries,
  type TrendGuardConfigInput,
} from "@market-sentinel/sdk";

import { runTrendGuard, type TrendGuardRun } from "./trendGuard.js";

export interface TrendGuardImprovement {
  /** `1 - strategyDD / buyHoldDD`; `null` when buy-and-hold never drew down. */
  readonly drawdownReduction: number | null;
  readonly cagrDelta: number;
  /** `null` when either Sharpe ratio is unavailable. */
  readonly sharpeDelta: number | null;
}

export type ComparisonRow =
  | ({
      readonly status: "ok";
      readonly symbol: string;
      readonly strategy: BacktestResult;
      readonly buyHold: BacktestResult;
    } & TrendGuardImprovement)
  | {
      readonly status: "error";
      readonly symbol: string;
      readonly error: { readonly code: AnalysisErrorCode | "unknown"; readonly message: string };
    };

export type ComparisonSortKey = keyof TrendGuardImprovement;

export interface ComparisonOptions {
  readonly config?: TrendGuardConfigInput;
  /** Sort ok rows descending by this field; error rows go last. Input order otherwise. */
  readonly sortBy?: ComparisonSortKey;
  readonly logger?: Logger;
}

export type SeriesLoader = (symbol: string) => Promise<PriceSeries>;

export const computeImprovement = (
  strategy: BacktestResult,
  buyHold: BacktestResult,
): TrendGuardImprovement => ({
  drawdownReduction: buyHold.maxDrawdown === 0 ? null : 1 - strategy.maxDrawdown / buyHold.maxDrawdown,
  cagrDelta: strategy.cagr - buyHold.cagr,
  sharpeDelta:
    strategy.sharpeRatio === null || buyHold.sharpeRatio === null
      ? null
      : strategy.sharpeRatio - buyHold.sharpeRatio,
});

const toOkRow = (symbol: string, run: TrendGuardRun): ComparisonRow => ({
  status: "ok",
  symbol,
  strategy: run.strategy,
  buyHold: run.buyHold,
  ...computeImprovement(run.strategy, run.buyHold),
});

const sortValue = (row: ComparisonRow, key: ComparisonSortKey): number => {
  if (row.status === "error") {
    return Number.NaN;
  }
  return row[key] ?? Number.NEGATIVE_INFINITY;
};

/**
 * Orders rows by `sortBy` descending, keeping error rows last. Stable for ties.
 */
export const sortComparisonRows = (
  rows: ReadonlyArray<ComparisonRow>,
  sortBy?: ComparisonSortKey,
): ComparisonRow[] => {
  if (!sortBy) {
    return [...rows];
  }
  return [...rows].sort((left, right) => {
    const a = sortValue(left, sortBy);
    const b = sortValue(right, sortBy);
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
    }
    if (a === b) {
      return 0;
    }
    return a > b ? -1 : 1;
  });
};

const failedRow = (symbol: string, error: unknown, logger: Logger): ComparisonRow => {
  const described = describeError(error);
  logger.warn("Trend Guard comparison failed", { symbol, code: described.code, error: described.message });
  return { status: "error", symbol, error: described };
};

const evaluate = (
  symbol: string,
  series: PriceSeries,
  options: ComparisonOptions,
  logger: Logger,
): ComparisonRow => {
  try {
    const run = runTrendGuard(series, options.config);
    logger.info("Trend Guard comparison complete", { symbol, months: run.strategy.monthCount });
    return toOkRow(symbol, run);
  } catch (error) {
    return failedRow(symbol, error, logger);
  }
};

/**
 * Runs Trend Guard independently for each series and reports the improvement
 * over buy-and-hold. A failing symbol becomes an error row.
 */
export const compareTrendGuard = (
  seriesList: ReadonlyArray<PriceSeries>,
  options: ComparisonOptions = {},
): ComparisonRow[] => {
  assertValid(TrendGuardConfigSchema, options.config ?? {}, "TrendGuardConfig");
  const logger = options.logger ?? createLogger("engine/comparison");
  const rows = seriesList.map((series) => evaluate(series.symbol, series, options, logger));
  return sortComparisonRows(rows, options.sortBy);
};

/**
 * Loads every symbol concurrently, then compares once all loads settle.
 * Load failures are isolated per symbol like pipeline failures.
 */
export const runTrendGuardComparison = async (
  symbols: ReadonlyArray<string>,
  loadSeries: SeriesLoader,
  options: ComparisonOptions = {},
): Promise<ComparisonRow[]> => {
  assertValid(TrendGuardConfigSchema, options.config ?? {}, "TrendGuardConfig");
  const logger = options.logger ?? createLogger("engine/comparison");

  const rows = await Promise.all(
    symbols.map(async (symbol): Promise<ComparisonRow> => {
      try {
        const series = await loadSeries(symbol);
        return evaluate(symbol, series, options, logger);
      } catch (error) {
        return failedRow(symbol, error, logger);
      }
    }),
  );
  return sortComparisonRows(rows, options.sortBy);
};
