import { DegenerateInputError } from "./errors.js";
import type { PriceSeries } from "./index.js";

/**
 * Throws when any bar is not strictly later than its predecessor.
 */
export const assertChronological = (series: PriceSeries): void => {
  for (let i = 1; i < series.bars.length; i += 1) {
    const prev = series.bars[i - 1];
    const current = series.bars[i];
    if (current.date <= prev.date) {
      throw new DegenerateInputError(
        `${series.symbol}: bar ${i} (${current.date}) is not after ${prev.date}`,
      );
    }
  }
};

/**
 * Returns the index of the last bar dated on or before `date`, or -1.
 */
export const findSessionIndex = (series: PriceSeries, date: string): number => {
  let low = 0;
  let high = series.bars.length - 1;
  let found = -1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (series.bars[mid].date <= date) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return found;
};

const DAY_MS = 24 * 60 * 60 * 1000;

const isWeekday = (epochMs: number): boolean => {
  const day = new Date(epochMs).getUTCDay();
  return day !== 0 && day !== 6;
};

const toEpoch = (date: string): number => Date.parse(`${date}T00:00:00.000Z`);

/**
 * Weekday sessions after the last bar, up to and including `date`. Zero when
 * `date` is not later than the last bar.
 */
export const countSessionsAfterLastBar = (series: PriceSeries, date: string): number => {
  const last = series.bars[series.bars.length - 1];
  const end = toEpoch(date);
  if (!last || Number.isNaN(end)) {
    return 0;
  }
  let count = 0;
  for (let day = toEpoch(last.date) + DAY_MS; day <= end; day += DAY_MS) {
    if (isWeekday(day)) {
      count += 1;
    }
  }
  return count;
};

/**
 * Date of the `n`-th weekday session after the last bar (`n >= 1`).
 */
export const sessionDateAfterLastBar = (series: PriceSeries, n: number): string => {
  const last = series.bars[series.bars.length - 1];
  let day = toEpoch(last.date);
  let remaining = n;
  while (remaining > 0) {
    day += DAY_MS;
    if (isWeekday(day)) {
      remaining -= 1;
    }
  }
  return new Date(day).toISOString().slice(0, 10);
};
