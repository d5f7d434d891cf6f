import type { ComparisonRow } from "@market-sentinel/engine";

import type { DistributionSummary, TrendGuardSummary } from "./summary.js";
import { toPercent } from "./summary.js";

const NOT_AVAILABLE = "n/a";

const fmtPercent = (value: number | null, digits = 2): string =>
  value === null ? NOT_AVAILABLE : `${value.toFixed(digits)}%`;

const fmtNumber = (value: number | null, digits = 2): string =>
  value === null ? NOT_AVAILABLE : value.toFixed(digits);

const fmtText = (value: string | null): string => value ?? NOT_AVAILABLE;

const appendNarrative = (md: string[], narrative?: string): void => {
  if (narrative === undefined) {
    return;
  }
  md.push("");
  md.push("### Analysis");
  md.push("");
  md.push(narrative.trim());
};

export const renderDistributionMarkdown = (summary: DistributionSummary, narrative?: string): string => {
  const md: string[] = [];
  md.push(`## Distribution Days: ${summary.symbol}`);
  md.push("");
  md.push(`As of ${summary.asOf} (${summary.sessionCount} sessions)`);
  md.push("");
  md.push(`**${summary.description}**`);
  md.push("");
  md.push("| Measure | Value |");
  md.push("| --- | --- |");
  md.push(`| Active distribution days | ${summary.activeDistributionDays} |`);
  md.push(`| Recent (last ${summary.recentWindowSessions} sessions) | ${summary.recentDistributionDays} |`);
  md.push(`| Expired | ${summary.expiredDistributionDays} |`);
  md.push(`| Detected | ${summary.rawDistributionDays} |`);
  md.push(`| Active weighted change | ${fmtPercent(summary.activeWeightedChangePct)} |`);
  md.push(`| Average volume increase | ${fmtPercent(summary.averageVolumeIncreasePct)} |`);
  md.push("");
  md.push("### Technicals");
  md.push("");
  md.push("| Indicator | Value |");
  md.push("| --- | --- |");
  md.push(`| Close | ${fmtNumber(summary.close)} |`);
  md.push(`| MA${summary.shortMaPeriod} | ${fmtNumber(summary.shortMa)} |`);
  md.push(`| MA${summary.longMaPeriod} | ${fmtNumber(summary.longMa)} |`);
  md.push(`| RSI | ${fmtNumber(summary.rsi)} |`);
  md.push(`| Trend | ${fmtText(summary.trend)} |`);
  md.push(`| Momentum | ${fmtText(summary.momentum)} |`);
  appendNarrative(md, narrative);
  md.push("");
  return md.join("\n");
};

export const renderTrendGuardMarkdown = (summary: TrendGuardSummary, narrative?: string): string => {
  const md: string[] = [];
  md.push(`## Trend Guard Backtest: ${summary.symbol}`);
  md.push("");
  md.push(`Period: ${summary.periodStart} to ${summary.periodEnd} (${summary.totalMonths} months)`);
  md.push("");
  md.push(`| Metric | Buy & Hold | ${summary.smaLookbackMonths}-Month Trend Guard |`);
  md.push("| --- | --- | --- |");
  md.push(`| CAGR | ${fmtPercent(summary.buyHoldCagrPct)} | ${fmtPercent(summary.strategyCagrPct)} |`);
  md.push(
    `| Max Drawdown | ${fmtPercent(summary.buyHoldMaxDrawdownPct)} | ${fmtPercent(summary.strategyMaxDrawdownPct)} |`,
  );
  md.push(`| Sharpe Ratio | ${fmtNumber(summary.buyHoldSharpe)} | ${fmtNumber(summary.strategySharpe)} |`);
  md.push("");
  md.push(`Time Invested: ${fmtPercent(summary.timeInvestedPct, 1)}`);
  md.push(`Drawdown Reduction: ${fmtPercent(summary.drawdownReductionPct, 1)}`);
  appendNarrative(md, narrative);
  md.push("");
  return md.join("\n");
};

/**
 * One line per symbol, in row order. Error rows show their code and message.
 */
export const renderComparisonMarkdown = (rows: ReadonlyArray<ComparisonRow>): string => {
  const md: string[] = [];
  md.push("## Trend Guard Comparison");
  md.push("");
  md.push("| Symbol | Drawdown Reduction | CAGR Delta | Sharpe Delta | Time Invested |");
  md.push("| --- | --- | --- | --- | --- |");
  for (const row of rows) {
    if (row.status === "error") {
      md.push(`| ${row.symbol} | ${row.error.code}: ${row.error.message} | | | |`);
      continue;
    }
    const reduction = row.drawdownReduction === null ? null : toPercent(row.drawdownReduction);
    md.push(
      `| ${row.symbol} | ${fmtPercent(reduction, 1)} | ${fmtPercent(toPercent(row.cagrDelta))} | ` +
        `${fmtNumber(row.sharpeDelta)} | ${fmtPercent(toPercent(row.strategy.timeInvestedFraction), 1)} |`,
    );
  }
  md.push("");
  return md.join("\n");
};

export const renderFailureMarkdown = (
  heading: string,
  symbol: string,
  error: { readonly code: string; readonly message: string },
): string => {
  return [`## ${heading}: ${symbol}`, "", `Analysis failed (${error.code}): ${error.message}`, ""].join("\n");
};

export interface ReportDocument {
  readonly title: string;
  readonly generatedAt: string;
  readonly sections: ReadonlyArray<string>;
}

export const renderReport = ({ title, generatedAt, sections }: ReportDocument): string => {
  return [`# ${title}`, "", `Generated: ${generatedAt}`, "", ...sections].join("\n");
};
