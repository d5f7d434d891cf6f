import {
  DegenerateInputError,
  InsufficientHistoryError,
  TrendGuardConfigSchema,
  assertValid,
  type EquityPoint,
  type MonthlyObservation,
  type Position,
  type TrendGuardConfigInput,
} from "@market-sentinel/sdk";

export interface SimulationResult {
  readonly strategyCurve: ReadonlyArray<EquityPoint>;
  readonly buyHoldCurve: ReadonlyArray<EquityPoint>;
  /** Realized monthly returns of the strategy, one per tradable month. */
  readonly strategyReturns: ReadonlyArray<number>;
  readonly buyHoldReturns: ReadonlyArray<number>;
  readonly positions: ReadonlyArray<Position>;
}

/**
 * Compounds the lagged positions into a Trend Guard equity curve and a
 * buy-and-hold curve over the same months.
 *
 * Both curves start at `initialCapital` on the month-end before the first
 * tradable month. An invested month earns the asset's month-end to month-end
 * return; a cash month earns `cashYield / 12`.
 */
export const simulateBacktest = (
  observations: ReadonlyArray<MonthlyObservation>,
  config: TrendGuardConfigInput = {},
): SimulationResult => {
  const { initialCapital, cashYield, smaLookbackMonths } = assertValid(
    TrendGuardConfigSchema,
    config,
    "TrendGuardConfig",
  );
  if (!(initialCapital > 0)) {
    throw new DegenerateInputError(`initialCapital must be positive, received ${initialCapital}`);
  }

  const firstTradable = observations.findIndex((entry) => entry.positionForThisMonth !== null);
  if (firstTradable < 1) {
    throw new InsufficientHistoryError(
      `No tradable month among ${observations.length} month-end observations`,
      smaLookbackMonths + 1,
      observations.length,
    );
  }

  const cashMonthlyRate = cashYield / 12;
  const start = observations[firstTradable - 1];
  let strategyEquity = initialCapital;
  let buyHoldEquity = initialCapital;

  const strategyCurve: EquityPoint[] = [{ date: start.monthEndDate, equity: strategyEquity }];
  const buyHoldCurve: EquityPoint[] = [{ date: start.monthEndDate, equity: buyHoldEquity }];
  const strategyReturns: number[] = [];
  const buyHoldReturns: number[] = [];
  const positions: Position[] = [];

  for (let i = firstTradable; i < observations.length; i += 1) {
    const previous = observations[i - 1];
    const current = observations[i];
    const position = current.positionForThisMonth;
    if (position === null) {
      throw new DegenerateInputError(`Month ${current.monthEndDate} has no position after trading began`);
    }
    if (!(previous.price > 0)) {
      throw new DegenerateInputError(`Month-end price on ${previous.monthEndDate} must be positive`);
    }

    const assetReturn = current.price / previous.price - 1;
    const realized = position === "invested" ? assetReturn : cashMonthlyRate;

    strategyEquity *= 1 + realized;
    buyHoldEquity *= 1 + assetReturn;

    strategyCurve.push({ date: current.monthEndDate, equity: strategyEquity });
    buyHoldCurve.push({ date: current.monthEndDate, equity: buyHoldEquity });
    strategyReturns.push(realized);
    buyHoldReturns.push(assetReturn);
    positions.push(position);
  }

  return { strategyCurve, buyHoldCurve, strategyReturns, buyHoldReturns, positions };
};
