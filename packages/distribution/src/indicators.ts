import {
  IndicatorConfigSchema,
  assertValid,
  type IndicatorConfigInput,
  type PriceSeries,
} from "@market-sentinel/sdk";

export type TrendReading = "strong_uptrend" | "strong_downtrend" | "bullish" | "bearish";
export type MomentumReading = "overbought" | "oversold" | "neutral";
export type IndicatorName = "shortMa" | "longMa" | "rsi";

export interface UnavailableIndicator {
  readonly indicator: IndicatorName;
  readonly required: number;
  readonly available: number;
}

/**
 * Latest moving-average and RSI readings. An indicator without enough history
 * is `null` and listed in `unavailable`.
 */
export interface TechnicalSnapshot {
  readonly asOf: string;
  readonly close: number;
  readonly shortMa: number | null;
  readonly longMa: number | null;
  readonly rsi: number | null;
  readonly trend: TrendReading | null;
  readonly momentum: MomentumReading | null;
  readonly unavailable: ReadonlyArray<UnavailableIndicator>;
}

/**
 * Mean of the trailing `period` values, or `null` with fewer values.
 */
export const simpleMovingAverage = (
  values: ReadonlyArray<number>,
  period: number,
): number | null => {
  if (period <= 0 || values.length < period) {
    return null;
  }
  let sum = 0;
  for (let i = values.length - period; i < values.length; i += 1) {
    sum += values[i];
  }
  return sum / period;
};

/**
 * Relative strength index with Wilder smoothing: gains and losses are
 * exponentially averaged with `alpha = 1 / period`, starting from the first
 * change. Needs `period + 1` closes; a flat history reads 50.
 */
export const relativeStrengthIndex = (
  closes: ReadonlyArray<number>,
  period = 14,
): number | null => {
  if (period <= 0 || closes.length < period + 1) {
    return null;
  }

  const first = closes[1] - closes[0];
  let avgGain = Math.max(first, 0);
  let avgLoss = Math.max(-first, 0);
  for (let i = 2; i < closes.length; i += 1) {
    const delta = closes[i] - closes[i - 1];
    avgGain += (Math.max(delta, 0) - avgGain) / period;
    avgLoss += (Math.max(-delta, 0) - avgLoss) / period;
  }

  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
};

const readTrend = (close: number, shortMa: number | null, longMa: number | null): TrendReading | null => {
  if (shortMa === null || longMa === null) {
    return null;
  }
  if (close > shortMa && shortMa > longMa) {
    return "strong_uptrend";
  }
  if (close < shortMa && shortMa < longMa) {
    return "strong_downtrend";
  }
  return shortMa > longMa ? "bullish" : "bearish";
};

export const computeTechnicalSnapshot = (
  series: PriceSeries,
  indicators: IndicatorConfigInput = {},
): TechnicalSnapshot => {
  const config = assertValid(IndicatorConfigSchema, indicators, "IndicatorConfig");
  const closes = series.bars.map((bar) => bar.close);
  const last = series.bars[series.bars.length - 1];

  const shortMa = simpleMovingAverage(closes, config.shortMaPeriod);
  const longMa = simpleMovingAverage(closes, config.longMaPeriod);
  const rsi = relativeStrengthIndex(closes, config.rsiPeriod);

  const unavailable: UnavailableIndicator[] = [];
  if (shortMa === null) {
    unavailable.push({ indicator: "shortMa", required: config.shortMaPeriod, available: closes.length });
  }
  if (longMa === null) {
    unavailable.push({ indicator: "longMa", required: config.longMaPeriod, available: closes.length });
  }
  if (rsi === null) {
    unavailable.push({ indicator: "rsi", required: config.rsiPeriod + 1, available: closes.length });
  }

  let momentum: MomentumReading | null = null;
  if (rsi !== null) {
    if (rsi > config.rsiOverbought) {
      momentum = "overbought";
    } else if (rsi < config.rsiOversold) {
      momentum = "oversold";
    } else {
      momentum = "neutral";
    }
  }

  return {
    asOf: last.date,
    close: last.close,
    shortMa,
    longMa,
    rsi,
    trend: readTrend(last.close, shortMa, longMa),
    momentum,
    unavailable,
  };
};
