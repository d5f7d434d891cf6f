/**
 * Trend Guard: monthly SMA signals, the backtest simulator and the
 * multi-symbol comparison against buy-and-hold.
 * @packageDocumentation
 */

export * from "./signals.js";
export * from "./simulator.js";
export * from "./trendGuard.js";
export * from "./comparison.js";
