/**
 * Distribution-day tracking: detection, expiration, market condition and
 * supporting technical indicators.
 * @packageDocumentation
 */

export * from "./detector.js";
export * from "./expiration.js";
export * from "./condition.js";
export * from "./indicators.js";
export * from "./analysis.js";
