export * from "./ISeriesSource.js";
export * from "./CsvSource.js";
export * from "./validation.js";
export { dedupeAndSortBars, filterBarsForRequest, toCalendarDay } from "./internalUtils.js";
