import type { Stats } from "node:fs";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import {
  InsufficientHistoryError,
  PriceBarSchema,
  type PriceBar,
  type PriceSeries,
} from "@market-sentinel/sdk";

import type { ISeriesSource, SeriesRequest } from "./ISeriesSource.js";
import {
  dedupeAndSortBars,
  filterBarsForRequest,
  slugify,
  toCalendarDay,
} from "./internalUtils.js";
import { validatePriceSeries } from "./validation.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

const CsvCachePayloadSchema = z.object({
  mtimeMs: z.number(),
  bars: z.array(PriceBarSchema),
});

interface CsvCachePayload {
  readonly mtimeMs: number;
  readonly bars: ReadonlyArray<PriceBar>;
}

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
  readonly cacheDir?: string;
}

/**
 * CSV-backed series source. Files are named `<symbol>.csv` and carry a header
 * row naming at least `date`, `close` and `volume` (`timestamp` is accepted for
 * `date`, and `adj close` is preferred over `close` when present).
 */
export class CsvSource implements ISeriesSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;
  private readonly cacheDir: string;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
    this.cacheDir = options.cacheDir ?? join(this.datasetsDir, ".cache");
  }

  public async loadSeries(request: SeriesRequest): Promise<PriceSeries> {
    const datasetPath = this.resolveDatasetPath(request.symbol);

    let datasetStat: Stats;
    try {
      datasetStat = await stat(datasetPath);
    } catch {
      throw new InsufficientHistoryError(
        `No dataset for ${request.symbol} at ${datasetPath}`,
        1,
        0,
      );
    }

    const cachePath = this.resolveCachePath(request.symbol);
    let bars = await this.readCache(cachePath, datasetStat.mtimeMs);
    if (!bars) {
      const content = await readFile(datasetPath, { encoding: "utf-8" });
      bars = parseCsv(content);
      await this.writeCache(cachePath, { mtimeMs: datasetStat.mtimeMs, bars });
    }

    return validatePriceSeries({
      symbol: request.symbol,
      bars: filterBarsForRequest(bars, request),
    });
  }

  private resolveDatasetPath(symbol: string): string {
    return join(this.datasetsDir, `${slugify(symbol)}.csv`);
  }

  private resolveCachePath(symbol: string): string {
    return join(this.cacheDir, `${slugify(symbol)}.json`);
  }

  private async readCache(
    cachePath: string,
    expectedMtimeMs: number,
  ): Promise<ReadonlyArray<PriceBar> | null> {
    let buffer: string;
    try {
      buffer = await readFile(cachePath, { encoding: "utf-8" });
    } catch {
      // no cache yet
      return null;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(buffer);
    } catch {
      // a truncated cache is rebuilt from the dataset
      return null;
    }
    const payload = CsvCachePayloadSchema.safeParse(raw);
    if (payload.success && payload.data.mtimeMs === expectedMtimeMs) {
      return payload.data.bars;
    }
    return null;
  }

  private async writeCache(cachePath: string, payload: CsvCachePayload): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    await writeFile(cachePath, JSON.stringify(payload), { encoding: "utf-8" });
  }
}

interface ColumnLayout {
  readonly date: number;
  readonly close: number;
  readonly volume: number;
}

const resolveColumns = (header: string): ColumnLayout | null => {
  const names = header.split(",").map((part) => part.trim().toLowerCase());
  const find = (...candidates: string[]): number => {
    for (const candidate of candidates) {
      const index = names.indexOf(candidate);
      if (index >= 0) {
        return index;
      }
    }
    return -1;
  };

  const date = find("date", "timestamp", "time");
  const close = find("adj close", "adj_close", "close");
  const volume = find("volume");
  if (date < 0 || close < 0 || volume < 0) {
    return null;
  }
  return { date, close, volume };
};

/**
 * Parses CSV content into chronologically sorted, de-duplicated bars.
 * Rows with unparsable numbers are skipped.
 */
export const parseCsv = (content: string): ReadonlyArray<PriceBar> => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    return [];
  }

  const [header, ...rows] = lines;
  const columns = resolveColumns(header);
  if (!columns) {
    return [];
  }

  const bars: PriceBar[] = [];
  for (const row of rows) {
    const bar = toBar(row, columns);
    if (bar) {
      bars.push(bar);
    }
  }
  return dedupeAndSortBars(bars);
};

const toBar = (row: string, columns: ColumnLayout): PriceBar | null => {
  const parts = row.split(",").map((part) => part.trim());
  const date = toCalendarDay(parts[columns.date] ?? "");
  if (!date) {
    return null;
  }

  const closeText = parts[columns.close] ?? "";
  const volumeText = parts[columns.volume] ?? "";
  if (closeText.length === 0 || volumeText.length === 0) {
    return null;
  }
  const close = Number(closeText);
  const volume = Number(volumeText);
  if (!Number.isFinite(close) || !Number.isFinite(volume)) {
    return null;
  }

  return { date, close, volume };
};

/**
 * Factory used by callers to construct the CSV series source.
 */
export const createCsvSource = (options?: CsvSourceOptions): CsvSource => {
  return new CsvSource(options);
};
