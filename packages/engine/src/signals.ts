import {
  TrendGuardConfigSchema,
  assertChronological,
  assertValid,
  type ISODate,
  type MonthlyObservation,
  type Position,
  type PriceSeries,
  type TrendGuardConfigInput,
} from "@market-sentinel/sdk";

export interface MonthEndPrice {
  readonly date: ISODate;
  readonly price: number;
}

/**
 * Last close of every calendar month present in the series.
 */
export const resampleMonthEnd = (series: PriceSeries): MonthEndPrice[] => {
  assertChronological(series);
  const monthEnds: MonthEndPrice[] = [];
  let currentMonth: string | null = null;
  for (const bar of series.bars) {
    const month = bar.date.slice(0, 7);
    const entry = { date: bar.date, price: bar.close };
    if (month === currentMonth) {
      monthEnds[monthEnds.length - 1] = entry;
    } else {
      monthEnds.push(entry);
      currentMonth = month;
    }
  }
  return monthEnds;
};

const computeAverage = (values: ReadonlyArray<number>): number => {
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

/**
 * Month-end observations with a trailing SMA and a one-month-lagged position.
 *
 * The signal at month m is `invested` when the month-end price is at or above
 * its trailing SMA. The position held during month m is the signal from month
 * m - 1, so the first `smaLookbackMonths` observations carry no position.
 */
export const generateMonthlySignals = (
  series: PriceSeries,
  config: TrendGuardConfigInput = {},
): MonthlyObservation[] => {
  const { smaLookbackMonths } = assertValid(TrendGuardConfigSchema, config, "TrendGuardConfig");
  const window: number[] = [];
  let previousSignal: Position | null = null;

  return resampleMonthEnd(series).map(({ date, price }): MonthlyObservation => {
    window.push(price);
    if (window.length > smaLookbackMonths) {
      window.shift();
    }
    const trailingSma = window.length < smaLookbackMonths ? null : computeAverage(window);
    const signal: Position | null =
      trailingSma === null ? null : price >= trailingSma ? "invested" : "cash";

    const observation: MonthlyObservation = {
      monthEndDate: date,
      price,
      trailingSma,
      signal,
      positionForThisMonth: previousSignal,
    };
    previousSignal = signal;
    return observation;
  });
};
