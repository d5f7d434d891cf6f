/**
 * Narrative summaries and markdown rendering for distribution and Trend Guard results.
 * @packageDocumentation
 */

export * from "./summary.js";
export * from "./narrative.js";
export * from "./markdown.js";
