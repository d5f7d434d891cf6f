import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { ISeriesSource } from "@market-sentinel/data";
import { analyzeBreadth, type BreadthRow } from "@market-sentinel/distribution";
import { runTrendGuardComparison, type ComparisonRow } from "@market-sentinel/engine";
import type { Logger } from "@market-sentinel/logger";
import {
  buildDistributionSummary,
  buildTrendGuardSummary,
  renderComparisonMarkdown,
  renderDistributionMarkdown,
  renderFailureMarkdown,
  renderReport,
  renderTrendGuardMarkdown,
  requestNarrative,
  type DistributionSummary,
  type NarrativeAnalyst,
  type TrendGuardSummary,
} from "@market-sentinel/report";
import {
  describeError,
  resolveAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigInput,
  type AnalysisErrorCode,
  type MarketVerdict,
  type PriceSeries,
} from "@market-sentinel/sdk";

type FailureDetail = { readonly code: AnalysisErrorCode | "unknown"; readonly message: string };

export type Outcome<T> =
  | { readonly status: "ok"; readonly summary: T; readonly narrative: string }
  | { readonly status: "error"; readonly error: FailureDetail };

export interface SymbolOutcome {
  readonly symbol: string;
  readonly distribution: Outcome<DistributionSummary>;
  readonly trendGuard: Outcome<TrendGuardSummary>;
}

export interface AnalysisManifest {
  readonly runId: string;
  readonly createdAt: string;
  readonly asOf: string | null;
  readonly config: AnalysisConfig;
  readonly symbols: ReadonlyArray<SymbolOutcome>;
  readonly breadth: Readonly<Record<MarketVerdict, number>>;
  readonly comparison: ReadonlyArray<ComparisonRow>;
  readonly artifacts: {
    readonly manifest: string;
    readonly reportMd: string;
  };
}

export interface AnalysisRequest {
  readonly symbols: ReadonlyArray<string>;
  /** Bars after this day are not loaded. */
  readonly asOf?: string;
  readonly runId?: string;
}

export interface AnalysisRunnerDependencies {
  readonly source: ISeriesSource;
  readonly logger: Logger;
  readonly reportsDir: string;
  readonly config?: AnalysisConfigInput;
  readonly analyst?: NarrativeAnalyst;
  readonly now?: () => Date;
}

export type AnalysisRunner = (request: AnalysisRequest) => Promise<AnalysisManifest>;

type LoadResult =
  | { readonly symbol: string; readonly series: PriceSeries }
  | { readonly symbol: string; readonly error: FailureDetail };

const ensureDirectory = async (...parts: string[]): Promise<string> => {
  const dir = join(...parts);
  await mkdir(dir, { recursive: true });
  return dir;
};

const summarize = async (
  symbol: string,
  breadthRow: BreadthRow,
  comparisonRow: ComparisonRow,
  config: AnalysisConfig,
  deps: AnalysisRunnerDependencies,
): Promise<SymbolOutcome> => {
  const distribution = async (): Promise<Outcome<DistributionSummary>> => {
    if (breadthRow.status === "error") {
      deps.logger.warn("Distribution analysis failed", {
        symbol,
        code: breadthRow.error.code,
        error: breadthRow.error.message,
      });
      return { status: "error", error: breadthRow.error };
    }
    const summary = buildDistributionSummary(breadthRow.analysis);
    const narrative = await requestNarrative(
      deps.analyst,
      { kind: "distribution", summary, image: null },
      deps.logger,
    );
    return { status: "ok", summary, narrative };
  };

  const trendGuard = async (): Promise<Outcome<TrendGuardSummary>> => {
    if (comparisonRow.status === "error") {
      return { status: "error", error: comparisonRow.error };
    }
    const summary = buildTrendGuardSummary({ ...comparisonRow, config: config.trendGuard });
    const narrative = await requestNarrative(
      deps.analyst,
      { kind: "trend_guard", summary, image: null },
      deps.logger,
    );
    return { status: "ok", summary, narrative };
  };

  const [distributionOutcome, trendGuardOutcome] = await Promise.all([distribution(), trendGuard()]);
  return { symbol, distribution: distributionOutcome, trendGuard: trendGuardOutcome };
};

const renderRunReport = (manifest: AnalysisManifest): string => {
  const sections = manifest.symbols.flatMap((outcome) => [
    outcome.distribution.status === "ok"
      ? renderDistributionMarkdown(outcome.distribution.summary, outcome.distribution.narrative)
      : renderFailureMarkdown("Distribution Days", outcome.symbol, outcome.distribution.error),
    outcome.trendGuard.status === "ok"
      ? renderTrendGuardMarkdown(outcome.trendGuard.summary, outcome.trendGuard.narrative)
      : renderFailureMarkdown("Trend Guard Backtest", outcome.symbol, outcome.trendGuard.error),
  ]);
  const breadth = manifest.breadth;
  sections.push(
    [
      "## Market Breadth",
      "",
      `Healthy: ${breadth.healthy} | Moderate pressure: ${breadth.moderate_pressure} | ` +
        `High pressure: ${breadth.high_pressure}`,
      "",
    ].join("\n"),
  );
  sections.push(renderComparisonMarkdown(manifest.comparison));

  return renderReport({
    title: `Market Sentinel Report ${manifest.runId}`,
    generatedAt: manifest.createdAt,
    sections,
  });
};

export const makeRunId = (date: Date): string =>
  `analysis-${date.toISOString().replace(/[:.]/g, "-")}`;

/**
 * Loads every requested symbol once, runs the distribution and Trend Guard
 * pipelines on each, and writes `manifest.json` and `report.md` under
 * `<reportsDir>/<runId>/`. A symbol that fails to load or analyze is reported
 * in its own outcome; the rest of the run continues.
 */
export const createAnalysisRunner = (deps: AnalysisRunnerDependencies): AnalysisRunner => {
  const now = deps.now ?? (() => new Date());

  return async (request) => {
    const startedAt = now();
    const runId = request.runId ?? makeRunId(startedAt);
    const config = resolveAnalysisConfig(deps.config);
    const logger = deps.logger;

    logger.info("Analysis run started", { runId, symbols: request.symbols.length });

    const requests = new Map<string, Promise<PriceSeries>>();
    const loadSeries = (symbol: string): Promise<PriceSeries> => {
      let pending = requests.get(symbol);
      if (!pending) {
        pending = deps.source.loadSeries({ symbol, end: request.asOf });
        requests.set(symbol, pending);
      }
      return pending;
    };

    const comparison = await runTrendGuardComparison(request.symbols, loadSeries, {
      config: config.trendGuard,
      logger: logger.child("trend-guard"),
    });

    const loads = await Promise.all(
      request.symbols.map(async (symbol): Promise<LoadResult> => {
        try {
          const series = await loadSeries(symbol);
          logger.debug("Series loaded", { symbol, bars: series.bars.length });
          return { symbol, series };
        } catch (error) {
          const detail = describeError(error);
          logger.warn("Series load failed", { symbol, code: detail.code, error: detail.message });
          return { symbol, error: detail };
        }
      }),
    );

    const loaded = loads.flatMap((entry) => ("series" in entry ? [entry.series] : []));
    const breadth = analyzeBreadth(loaded, { config, asOf: request.asOf });

    const outcomes = await Promise.all(
      loads.map(async (entry, index): Promise<SymbolOutcome> => {
        if (!("series" in entry)) {
          return {
            symbol: entry.symbol,
            distribution: { status: "error", error: entry.error },
            trendGuard: { status: "error", error: entry.error },
          };
        }
        const breadthRow = breadth.rows[loaded.indexOf(entry.series)];
        return summarize(entry.symbol, breadthRow, comparison[index], config, deps);
      }),
    );

    const runDir = await ensureDirectory(deps.reportsDir, runId);
    const manifestPath = join(runDir, "manifest.json");
    const reportPath = join(runDir, "report.md");

    const manifest: AnalysisManifest = {
      runId,
      createdAt: startedAt.toISOString(),
      asOf: request.asOf ?? null,
      config,
      symbols: outcomes,
      breadth: breadth.verdicts,
      comparison,
      artifacts: { manifest: manifestPath, reportMd: reportPath },
    };

    await writeFile(reportPath, renderRunReport(manifest), { encoding: "utf-8" });
    await writeFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, { encoding: "utf-8" });

    const failedSymbols = outcomes.filter(
      (outcome) => outcome.distribution.status === "error" || outcome.trendGuard.status === "error",
    ).length;
    logger.info("Analysis run completed", { runId, failedSymbols, reportMd: reportPath });
    return manifest;
  };
};
