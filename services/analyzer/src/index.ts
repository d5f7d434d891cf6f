import { config as loadEnv } from "dotenv";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { CsvSource } from "@market-sentinel/data";
import { createLogger } from "@market-sentinel/logger";

import { loadAnalyzerEnv } from "./env.js";
import { createAnalysisRunner } from "./runner.js";

export * from "./env.js";
export * from "./runner.js";

const logger = createLogger("services/analyzer");

const main = async (): Promise<void> => {
  const env = loadAnalyzerEnv(process.env, REPO_ROOT);
  logger.info("Starting analysis", {
    symbols: env.symbols.join(","),
    datasetsDir: env.datasetsDir,
    asOf: env.asOf ?? null,
  });

  const runAnalysis = createAnalysisRunner({
    source: new CsvSource({ datasetsDir: env.datasetsDir }),
    logger,
    reportsDir: env.reportsDir,
    config: { trendGuard: { cashYield: env.cashYield } },
  });

  const manifest = await runAnalysis({ symbols: env.symbols, asOf: env.asOf });
  logger.info("Report written", { runId: manifest.runId, reportMd: manifest.artifacts.reportMd });
};

const shouldAutostart = process.env.ANALYZER_AUTOSTART !== "false";

if (shouldAutostart) {
  void main().catch((error) => {
    logger.error("Analysis failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
