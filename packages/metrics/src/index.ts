import {
  InsufficientHistoryError,
  type BacktestResult,
  type EquityCurve,
  type EquityPoint,
  type Position,
} from "@market-sentinel/sdk";

const MONTHS_PER_YEAR = 12;
const ZERO_DEVIATION = 1e-12;

export const calculateReturns = (points: ReadonlyArray<EquityPoint>): number[] => {
  if (points.length < 2) {
    return [];
  }
  const returns: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    const prev = points[i - 1];
    const current = points[i];
    if (prev.equity <= 0) {
      continue;
    }
    returns.push((current.equity - prev.equity) / prev.equity);
  }
  return returns;
};

const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

/**
 * Sample standard deviation (n - 1 denominator).
 */
export const sampleStandardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => {
      const diff = value - avg;
      return acc + diff * diff;
    }, 0) /
    (values.length - 1);
  return Math.sqrt(variance);
};

/**
 * Annualized Sharpe ratio of monthly returns against a cash yield.
 *
 * Mean excess return over `cashYield / 12`, divided by the sample standard
 * deviation of the returns, times √12. `null` with fewer than two returns,
 * zero when the returns have no dispersion.
 */
export const calculateSharpe = (
  monthlyReturns: ReadonlyArray<number>,
  cashYield = 0,
): number | null => {
  if (monthlyReturns.length < 2) {
    return null;
  }
  const std = sampleStandardDeviation(monthlyReturns);
  if (std < ZERO_DEVIATION) {
    return 0;
  }
  const excess = monthlyReturns.map((value) => value - cashYield / MONTHS_PER_YEAR);
  return (mean(excess) / std) * Math.sqrt(MONTHS_PER_YEAR);
};

/**
 * Largest peak-to-trough decline as a fraction `<= 0`.
 */
export const calculateMaxDrawdown = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length === 0) {
    return 0;
  }
  let peak = points[0].equity;
  let maxDrawdown = 0;
  for (const point of points) {
    if (point.equity > peak) {
      peak = point.equity;
    }
    if (peak > 0) {
      const drawdown = point.equity / peak - 1;
      if (drawdown < maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return maxDrawdown;
};

/**
 * `(final / initial)^(12 / n) - 1` for a curve of monthly points, where `n`
 * is the number of monthly periods between the first and last point.
 */
export const calculateCagr = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length < 2) {
    return 0;
  }
  const start = points[0];
  const end = points[points.length - 1];
  if (start.equity <= 0 || end.equity < 0) {
    return 0;
  }
  const periods = points.length - 1;
  return Math.pow(end.equity / start.equity, MONTHS_PER_YEAR / periods) - 1;
};

export const calculateTimeInvested = (positions: ReadonlyArray<Position>): number => {
  if (positions.length === 0) {
    return 0;
  }
  return positions.filter((position) => position === "invested").length / positions.length;
};

export interface BacktestResultInput {
  readonly curve: EquityCurve;
  /** Position held during each month of the curve after the first point. */
  readonly positions: ReadonlyArray<Position>;
  readonly cashYield: number;
  /** Realized monthly returns; derived from the curve when omitted. */
  readonly returns?: ReadonlyArray<number>;
}

export const calculateBacktestResult = ({
  curve,
  positions,
  cashYield,
  returns = calculateReturns(curve),
}: BacktestResultInput): BacktestResult => {
  if (curve.length < 2) {
    throw new InsufficientHistoryError("Backtest result needs at least two equity points", 2, curve.length);
  }
  const first = curve[0];
  const last = curve[curve.length - 1];

  return {
    cagr: calculateCagr(curve),
    maxDrawdown: calculateMaxDrawdown(curve),
    sharpeRatio: calculateSharpe(returns, cashYield),
    timeInvestedFraction: calculateTimeInvested(positions),
    totalReturn: first.equity > 0 ? last.equity / first.equity - 1 : 0,
    finalEquity: last.equity,
    periodStart: first.date,
    periodEnd: last.date,
    monthCount: curve.length - 1,
  };
};
