import type { Logger } from "@market-sentinel/logger";

import type { DistributionSummary, TrendGuardSummary } from "./summary.js";

/** Opaque chart artifact passed through to the analyst unchanged. */
export interface ChartImage {
  readonly mimeType: string;
  readonly data: Uint8Array | string;
}

export type NarrativeSummary = DistributionSummary | TrendGuardSummary;

export interface NarrativeRequest {
  readonly kind: "distribution" | "trend_guard";
  readonly summary: NarrativeSummary;
  readonly image: ChartImage | null;
}

/**
 * External collaborator that turns a summary (and optional chart) into prose.
 */
export interface NarrativeAnalyst {
  analyze(request: NarrativeRequest): Promise<string>;
}

export const NARRATIVE_UNAVAILABLE = "Narrative analysis unavailable: no analyst configured.";

/**
 * Asks the analyst for a narrative. A missing analyst or a failed call yields a
 * placeholder line so the report can still be written.
 */
export const requestNarrative = async (
  analyst: NarrativeAnalyst | undefined,
  request: NarrativeRequest,
  logger?: Logger,
): Promise<string> => {
  if (!analyst) {
    return NARRATIVE_UNAVAILABLE;
  }
  try {
    return await analyst.analyze(request);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn("Narrative analysis failed", {
      symbol: request.summary.symbol,
      kind: request.kind,
      error: message,
    });
    return `Narrative analysis failed: ${message}`;
  }
};
