import { calculateBacktestResult } from "@market-sentinel/metrics";
import {
  InsufficientHistoryError,
  TrendGuardConfigSchema,
  assertValid,
  type BacktestResult,
  type EquityCurve,
  type MonthlyObservation,
  type PriceSeries,
  type TrendGuardConfig,
  type TrendGuardConfigInput,
} from "@market-sentinel/sdk";

import { generateMonthlySignals } from "./signals.js";
import { simulateBacktest } from "./simulator.js";

export interface TrendGuardRun {
  readonly symbol: string;
  readonly config: TrendGuardConfig;
  readonly observations: ReadonlyArray<MonthlyObservation>;
  readonly strategy: BacktestResult;
  readonly buyHold: BacktestResult;
  readonly strategyCurve: EquityCurve;
  readonly buyHoldCurve: EquityCurve;
}

/**
 * Signals, simulation and metrics for one symbol.
 *
 * @throws InsufficientHistoryError with fewer than `smaLookbackMonths + 1` month-ends.
 */
export const runTrendGuard = (
  series: PriceSeries,
  configInput: TrendGuardConfigInput = {},
): TrendGuardRun => {
  const config = assertValid(TrendGuardConfigSchema, configInput, "TrendGuardConfig");
  const observations = generateMonthlySignals(series, config);

  const required = config.smaLookbackMonths + 1;
  if (observations.length < required) {
    throw new InsufficientHistoryError(
      `${series.symbol}: Trend Guard needs ${required} month-ends, found ${observations.length}`,
      required,
      observations.length,
    );
  }

  const simulation = simulateBacktest(observations, config);

  return {
    symbol: series.symbol,
    config,
    observations,
    strategy: calculateBacktestResult({
      curve: simulation.strategyCurve,
      positions: simulation.positions,
      returns: simulation.strategyReturns,
      cashYield: config.cashYield,
    }),
    buyHold: calculateBacktestResult({
      curve: simulation.buyHoldCurve,
      positions: simulation.positions.map(() => "invested" as const),
      returns: simulation.buyHoldReturns,
      cashYield: config.cashYield,
    }),
    strategyCurve: simulation.strategyCurve,
    buyHoldCurve: simulation.buyHoldCurve,
  };
};
