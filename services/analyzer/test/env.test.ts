import { strict as assert } from "node:assert";
import test from "node:test";

import { ConfigurationError } from "@market-sentinel/sdk";

import { loadAnalyzerEnv } from "../src/env.js";

test("defaults resolve against the root directory", () => {
  assert.deepEqual(loadAnalyzerEnv({}, "/repo"), {
    datasetsDir: "/repo/storage/datasets",
    reportsDir: "/repo/storage/reports",
    symbols: ["SPY", "EEM"],
    cashYield: 0.03,
  });
});

test("overrides are trimmed, deduplicated and coerced", () => {
  const env = loadAnalyzerEnv(
    {
      DATASETS_DIR: "/data/prices",
      REPORTS_DIR: "out/reports",
      SYMBOLS: " ^GSPC, EEM,,EEM ",
      CASH_YIELD: "0.01",
      AS_OF: "2024-06-28",
    },
    "/repo",
  );

  assert.deepEqual(env, {
    datasetsDir: "/data/prices",
    reportsDir: "/repo/out/reports",
    symbols: ["^GSPC", "EEM"],
    cashYield: 0.01,
    asOf: "2024-06-28",
  });
});

test("empty values fall back to defaults", () => {
  const env = loadAnalyzerEnv({ SYMBOLS: "", CASH_YIELD: " ", AS_OF: "" }, "/repo");

  assert.deepEqual(env.symbols, ["SPY", "EEM"]);
  assert.equal(env.cashYield, 0.03);
  assert.equal("asOf" in env, false);
});

test("invalid values raise configuration errors", () => {
  for (const overrides of [{ CASH_YIELD: "abc" }, { CASH_YIELD: "2" }, { SYMBOLS: " , " }, { AS_OF: "June" }]) {
    assert.throws(
      () => loadAnalyzerEnv(overrides, "/repo"),
      (error: unknown) =>
        error instanceof ConfigurationError && error.message.startsWith("Invalid analyzer environment:"),
    );
  }
});
