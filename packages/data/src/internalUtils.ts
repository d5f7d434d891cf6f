import type { PriceBar } from "@market-sentinel/sdk";

import type { SeriesRequest } from "./ISeriesSource.js";

/**
 * Shared helpers used across series sources to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

/**
 * Keeps bars inside the optional inclusive range of a {@link SeriesRequest}.
 */
export const filterBarsForRequest = (
  bars: ReadonlyArray<PriceBar>,
  request: SeriesRequest,
): ReadonlyArray<PriceBar> => {
  const { start, end } = request;
  if (!start && !end) {
    return bars;
  }

  return bars.filter((bar) => {
    const isAfterStart = start ? bar.date >= start : true;
    const isBeforeEnd = end ? bar.date <= end : true;
    return isAfterStart && isBeforeEnd;
  });
};

/**
 * Sorts chronologically and keeps the last bar seen for each date.
 */
export const dedupeAndSortBars = (bars: ReadonlyArray<PriceBar>): PriceBar[] => {
  const map = new Map<string, PriceBar>();
  for (const bar of bars) {
    map.set(bar.date, bar);
  }
  return Array.from(map.values()).sort((a, b) => {
    if (a.date === b.date) {
      return 0;
    }
    return a.date < b.date ? -1 : 1;
  });
};

/**
 * Reduces an ISO timestamp or calendar day to `YYYY-MM-DD`.
 */
export const toCalendarDay = (value: string): string | null => {
  const trimmed = value.trim();
  const match = /^(\d{4}-\d{2}-\d{2})/u.exec(trimmed);
  if (match) {
    return match[1] ?? null;
  }
  const epoch = Date.parse(trimmed);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return new Date(epoch).toISOString().slice(0, 10);
};
