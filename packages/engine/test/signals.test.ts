import { strict as assert } from "node:assert";
import test from "node:test";

import { ConfigurationError, DegenerateInputError } from "@market-sentinel/sdk";

import { generateMonthlySignals, resampleMonthEnd } from "../src/signals.js";
import { monthEndDate, monthlySeries } from "./fixtures.js";

const flatThenFalling = [...Array.from({ length: 12 }, () => 100), 90, 80];

test("resampleMonthEnd keeps the last close of each calendar month", () => {
  const monthEnds = resampleMonthEnd({
    symbol: "AAA",
    bars: [
      { date: "2024-01-02", close: 10, volume: 1 },
      { date: "2024-01-31", close: 11, volume: 1 },
      { date: "2024-02-01", close: 12, volume: 1 },
      { date: "2024-03-15", close: 13, volume: 1 },
    ],
  });

  assert.deepEqual(monthEnds, [
    { date: "2024-01-31", price: 11 },
    { date: "2024-02-01", price: 12 },
    { date: "2024-03-15", price: 13 },
  ]);
});

test("positions lag the signal by one month", () => {
  const observations = generateMonthlySignals(monthlySeries(flatThenFalling));
  assert.equal(observations.length, 14);

  const month12 = observations[11];
  assert.equal(month12.trailingSma, 100);
  assert.equal(month12.signal, "invested");
  assert.equal(month12.positionForThisMonth, null);

  // month 13 closes below its SMA but is still held from month 12's signal
  const month13 = observations[12];
  assert.equal(month13.price, 90);
  assert.equal(month13.signal, "cash");
  assert.equal(month13.positionForThisMonth, "invested");

  const month14 = observations[13];
  assert.equal(month14.trailingSma, 97.5);
  assert.equal(month14.signal, "cash");
  assert.equal(month14.positionForThisMonth, "cash");
});

test("the first lookback months carry no SMA-driven position", () => {
  const observations = generateMonthlySignals(monthlySeries(flatThenFalling));

  assert.deepEqual(
    observations.slice(0, 12).map((entry) => entry.positionForThisMonth),
    Array.from({ length: 12 }, () => null),
  );
  assert.deepEqual(
    observations.slice(0, 11).map((entry) => entry.trailingSma),
    Array.from({ length: 11 }, () => null),
  );
  assert.equal(observations[0].monthEndDate, monthEndDate(0));
  assert.equal(observations[13].monthEndDate, monthEndDate(13));
});

test("a price equal to its SMA is an invested signal", () => {
  const observations = generateMonthlySignals(monthlySeries([5, 5, 5]), { smaLookbackMonths: 3 });
  assert.equal(observations[2].trailingSma, 5);
  assert.equal(observations[2].signal, "invested");
});

test("smaLookbackMonths sets the trailing window", () => {
  const observations = generateMonthlySignals(monthlySeries([10, 20, 30, 6]), {
    smaLookbackMonths: 3,
  });

  assert.deepEqual(
    observations.map((entry) => [entry.trailingSma, entry.signal, entry.positionForThisMonth]),
    [
      [null, null, null],
      [null, null, null],
      [20, "invested", null],
      [(20 + 30 + 6) / 3, "cash", "invested"],
    ],
  );
});

test("out-of-order bars and invalid lookbacks are rejected", () => {
  const series = monthlySeries(flatThenFalling);
  assert.throws(
    () => generateMonthlySignals({ symbol: "BAD", bars: series.bars.slice().reverse() }),
    DegenerateInputError,
  );
  assert.throws(() => generateMonthlySignals(series, { smaLookbackMonths: 1 }), ConfigurationError);
});
