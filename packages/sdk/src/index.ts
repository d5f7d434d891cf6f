// Source of truth for the data model shared by the distribution and Trend Guard pipelines.
// Every analytical package consumes these shapes; none of them mutate a PriceSeries.

import { z } from "zod";

import { AnalysisConfigSchema, type AnalysisConfig, type AnalysisConfigInput } from "./config.js";
import { ConfigurationError } from "./errors.js";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** ISO-8601 calendar day (`YYYY-MM-DD`). */
export type ISODate = string;

/** Why a distribution day stopped counting toward market pressure. */
export type ExpirationReason = "none" | "time" | "price_recovery";

/** Qualitative market health derived from active distribution days. */
export type MarketVerdict = "healthy" | "moderate_pressure" | "high_pressure";

/** Exposure held by Trend Guard during a month. */
export type Position = "invested" | "cash";

/** -----------------------------------------------------------------------
 *  PriceSeries
 *  -------------------------------------------------------------------- */

/**
 * One trading session. Bars inside a series are strictly increasing by date.
 */
export interface PriceBar {
  readonly date: ISODate;
  readonly close: number;
  readonly volume: number;
}

/**
 * Ordered daily bars for a single symbol, produced by a data-fetch collaborator.
 */
export interface PriceSeries {
  /** Instrument symbol (e.g., "^GSPC", "EEM"). */
  readonly symbol: string;
  readonly bars: ReadonlyArray<PriceBar>;
}

/** Runtime validator for a single {@link PriceBar}. */
export const PriceBarSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/u, "expected YYYY-MM-DD"),
  close: z.number().finite().nonnegative(),
  volume: z.number().finite().nonnegative(),
});

/** Runtime validator for {@link PriceSeries}. Ordering is checked separately. */
export const PriceSeriesSchema = z.object({
  symbol: z.string().min(1),
  bars: z.array(PriceBarSchema).min(1),
});

/** -----------------------------------------------------------------------
 *  Distribution days
 *  -------------------------------------------------------------------- */

/**
 * A session where price closed lower on higher volume than the prior session.
 * Records are never dropped from the log; expiry only removes them from counts.
 */
export interface DistributionDayRecord {
  readonly date: ISODate;
  /** Index of the bar inside the series it was detected in. */
  readonly sessionIndex: number;
  readonly close: number;
  readonly volume: number;
  /** `close / prevClose - 1`. */
  readonly percentChange: number;
  /** `volume / prevVolume - 1`, or 0 when the previous volume was 0. */
  readonly volumeChange: number;
  /** `percentChange * (1 + volumeChange)`. */
  readonly weightedChange: number;
  readonly expired: boolean;
  readonly expirationReason: ExpirationReason;
  /** Session on which the expiration condition was met. */
  readonly expiredOn: ISODate | null;
}

/**
 * Aggregated distribution pressure as of a given session.
 */
export interface MarketCondition {
  readonly asOf: ISODate;
  readonly totalCount: number;
  readonly recentCount: number;
  readonly totalWeightedChange: number;
  readonly verdict: MarketVerdict;
  readonly description: string;
  readonly activeRecords: ReadonlyArray<DistributionDayRecord>;
}

/** -----------------------------------------------------------------------
 *  Trend Guard
 *  -------------------------------------------------------------------- */

/**
 * Month-end observation. `positionForThisMonth` is the signal computed at the
 * previous month-end; `null` marks months that cannot be traded.
 */
export interface MonthlyObservation {
  readonly monthEndDate: ISODate;
  readonly price: number;
  readonly trailingSma: number | null;
  /** Raw signal from this month's close; drives next month's position. */
  readonly signal: Position | null;
  readonly positionForThisMonth: Position | null;
}

/** Equity value after a month has been applied. */
export interface EquityPoint {
  readonly date: ISODate;
  readonly equity: number;
}

export type EquityCurve = ReadonlyArray<EquityPoint>;

/**
 * Risk/return summary for one (symbol, strategy) pair.
 */
export interface BacktestResult {
  readonly cagr: number;
  /** Largest peak-to-trough decline as a negative fraction (0 when none). */
  readonly maxDrawdown: number;
  /** `null` with fewer than two monthly returns. */
  readonly sharpeRatio: number | null;
  readonly timeInvestedFraction: number;
  readonly totalReturn: number;
  readonly finalEquity: number;
  readonly periodStart: ISODate;
  readonly periodEnd: ISODate;
  readonly monthCount: number;
}

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param schema - Zod schema used for validation.
 * @param value - Candidate payload to validate.
 * @param label - Descriptive label for error reporting.
 * @returns The parsed payload with schema defaults applied.
 * @throws ConfigurationError when validation fails.
 */
export function assertValid<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label = "payload",
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/**
 * Applies documented defaults to a partial configuration.
 */
export const resolveAnalysisConfig = (input: AnalysisConfigInput = {}): AnalysisConfig => {
  return assertValid(AnalysisConfigSchema, input, "AnalysisConfig");
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = resolveAnalysisConfig();

/** -----------------------------------------------------------------------
 *  Re-exports grouped for convenience
 *  -------------------------------------------------------------------- */

/** Namespaced access to the primary schemas. */
export const Schemas = {
  PriceBar: PriceBarSchema,
  PriceSeries: PriceSeriesSchema,
  AnalysisConfig: AnalysisConfigSchema,
};

export * from "./errors.js";
export * from "./config.js";
export * from "./series.js";
