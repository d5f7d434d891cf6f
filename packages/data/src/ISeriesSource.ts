import type { ISODate, PriceSeries } from "@market-sentinel/sdk";

/**
 * Symbol and optional inclusive date range to load.
 */
export interface SeriesRequest {
  readonly symbol: string;
  readonly start?: ISODate;
  readonly end?: ISODate;
}

/**
 * Generic contract for the data-fetch collaborator. Implementations return a
 * complete, already validated series or throw.
 */
export interface ISeriesSource {
  readonly id: string;
  loadSeries(request: SeriesRequest): Promise<PriceSeries>;
}
