import type { PriceBar, PriceSeries } from "@market-sentinel/sdk";

const DAY_MS = 24 * 60 * 60 * 1000;

export const dayAfter = (start: string, offset: number): string => {
  return new Date(Date.parse(`${start}T00:00:00.000Z`) + offset * DAY_MS).toISOString().slice(0, 10);
};

/**
 * Builds a series from `[close, volume]` pairs on consecutive calendar days.
 */
export const seriesOf = (
  rows: ReadonlyArray<readonly [number, number]>,
  symbol = "TEST",
  start = "2024-01-01",
): PriceSeries => ({
  symbol,
  bars: rows.map(([close, volume], index): PriceBar => ({
    date: dayAfter(start, index),
    close,
    volume,
  })),
});

/**
 * Deterministic pseudo-random walk for property-style checks.
 */
export const randomWalk = (length: number, seed: number, symbol = "WALK"): PriceSeries => {
  let state = seed;
  const next = (): number => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
  const rows: Array<[number, number]> = [];
  let close = 100;
  let volume = 1_000_000;
  for (let i = 0; i < length; i += 1) {
    rows.push([close, volume]);
    close = Math.max(1, close * (1 + (next() - 0.5) * 0.06));
    volume = Math.max(1, Math.round(volume * (1 + (next() - 0.5) * 0.4)));
  }
  return seriesOf(rows, symbol);
};
