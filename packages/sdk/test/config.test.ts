import { strict as assert } from "node:assert";
import test from "node:test";

import {
  ConfigurationError,
  DEFAULT_ANALYSIS_CONFIG,
  ExpirationConfigSchema,
  assertValid,
  resolveAnalysisConfig,
} from "../src/index.js";

test("resolveAnalysisConfig applies documented defaults", () => {
  const config = resolveAnalysisConfig();

  assert.equal(config.distribution.expiration.timeLimitSessions, 25);
  assert.equal(config.distribution.expiration.recoveryThreshold, 0.05);
  assert.equal(config.distribution.qualification.minPercentDecline, 0);
  assert.equal(config.distribution.qualification.weightedChangeThreshold, null);
  assert.equal(config.distribution.condition.moderateCount, 5);
  assert.equal(config.distribution.condition.highCount, 8);
  assert.equal(config.distribution.condition.recentHighCount, 4);
  assert.equal(config.distribution.condition.recentWindowSessions, 10);
  assert.equal(config.indicators.shortMaPeriod, 50);
  assert.equal(config.indicators.longMaPeriod, 200);
  assert.equal(config.indicators.rsiPeriod, 14);
  assert.equal(config.trendGuard.smaLookbackMonths, 12);
  assert.equal(config.trendGuard.cashYield, 0.03);
  assert.equal(config.trendGuard.initialCapital, 1);
});

test("DEFAULT_ANALYSIS_CONFIG matches an empty resolution", () => {
  assert.deepEqual(DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig({}));
});

test("partial overrides keep sibling defaults", () => {
  const config = resolveAnalysisConfig({
    distribution: { expiration: { timeLimitSessions: 20 } },
    trendGuard: { cashYield: 0.01 },
  });

  assert.equal(config.distribution.expiration.timeLimitSessions, 20);
  assert.equal(config.distribution.expiration.recoveryThreshold, 0.05);
  assert.equal(config.distribution.condition.highCount, 8);
  assert.equal(config.trendGuard.cashYield, 0.01);
  assert.equal(config.trendGuard.smaLookbackMonths, 12);
});

test("negative expiration window is a configuration error", () => {
  assert.throws(
    () => resolveAnalysisConfig({ distribution: { expiration: { timeLimitSessions: -1 } } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.code, "configuration");
      assert.match(error.message, /distribution\.expiration\.timeLimitSessions/u);
      return true;
    },
  );
});

test("moderate count above high count is rejected", () => {
  assert.throws(
    () =>
      resolveAnalysisConfig({
        distribution: { condition: { moderateCount: 9, highCount: 8 } },
      }),
    /moderateCount must not exceed highCount/u,
  );
});

test("short moving average must be shorter than the long one", () => {
  assert.throws(
    () => resolveAnalysisConfig({ indicators: { shortMaPeriod: 200, longMaPeriod: 50 } }),
    ConfigurationError,
  );
});

test("assertValid reports every failing path", () => {
  assert.throws(
    () =>
      assertValid(
        ExpirationConfigSchema,
        { timeLimitSessions: 0, recoveryThreshold: -0.1 },
        "ExpirationConfig",
      ),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.issues.length, 2);
      assert.ok(error.message.startsWith("Invalid ExpirationConfig: "));
      return true;
    },
  );
});
