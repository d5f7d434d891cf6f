import type { PriceBar, PriceSeries } from "@market-sentinel/sdk";

const monthKey = (index: number, startYear: number): string => {
  const year = startYear + Math.floor(index / 12);
  const month = (index % 12) + 1;
  return `${year}-${String(month).padStart(2, "0")}`;
};

/**
 * Two sessions per month; the later one closes at the given month-end price.
 */
export const monthlySeries = (
  monthEndPrices: ReadonlyArray<number>,
  symbol = "TEST",
  startYear = 2000,
): PriceSeries => ({
  symbol,
  bars: monthEndPrices.flatMap((price, index): PriceBar[] => {
    const month = monthKey(index, startYear);
    return [
      { date: `${month}-10`, close: price * 0.97, volume: 1_000 },
      { date: `${month}-28`, close: price, volume: 1_000 },
    ];
  }),
});

export const monthEndDate = (index: number, startYear = 2000): string =>
  `${monthKey(index, startYear)}-28`;

/** 24 months of gains, a year of 10% monthly losses, then two years of 5% gains. */
export const crashAndRecovery = (): number[] => {
  const prices = Array.from({ length: 24 }, (_, i) => 100 + i);
  for (let i = 0; i < 12; i += 1) {
    prices.push(prices[prices.length - 1] * 0.9);
  }
  for (let i = 0; i < 24; i += 1) {
    prices.push(prices[prices.length - 1] * 1.05);
  }
  return prices;
};

export const steadyRise = (months: number): number[] =>
  Array.from({ length: months }, (_, i) => 100 * 1.01 ** i);
