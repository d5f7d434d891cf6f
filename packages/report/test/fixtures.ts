import { analyzeDistribution, type DistributionAnalysis } from "@market-sentinel/distribution";
import { runTrendGuard, type TrendGuardRun } from "@market-sentinel/engine";
import type { PriceSeries } from "@market-sentinel/sdk";

export const sampleDistributionSeries: PriceSeries = {
  symbol: "SAMPLE",
  bars: [
    { date: "2024-01-01", close: 100, volume: 1_000 },
    { date: "2024-01-02", close: 99, volume: 1_100 },
    { date: "2024-01-03", close: 98, volume: 1_050 },
    { date: "2024-01-04", close: 99, volume: 1_200 },
    { date: "2024-01-05", close: 97, volume: 1_300 },
  ],
};

const monthEnd = (index: number): string =>
  `${2020 + Math.floor(index / 12)}-${String((index % 12) + 1).padStart(2, "0")}-28`;

/** Twelve flat month-ends followed by two declining ones. */
export const fallingMonthsSeries: PriceSeries = {
  symbol: "FALL",
  bars: [...Array.from({ length: 12 }, () => 100), 90, 80].map((close, index) => ({
    date: monthEnd(index),
    close,
    volume: 1_000,
  })),
};

export const sampleAnalysis = (): DistributionAnalysis => analyzeDistribution(sampleDistributionSeries);

export const fallingRun = (): TrendGuardRun => runTrendGuard(fallingMonthsSeries);
