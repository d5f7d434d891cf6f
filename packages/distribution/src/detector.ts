import {
  QualificationConfigSchema,
  assertChronological,
  assertValid,
  type DistributionDayRecord,
  type PriceSeries,
  type QualificationConfigInput,
} from "@market-sentinel/sdk";

/**
 * Scans a series for sessions that closed lower on higher volume than the
 * session before. Pure: the series is only read.
 *
 * @returns One unexpired record per qualifying session, in date order.
 */
export const detectDistributionDays = (
  series: PriceSeries,
  qualification: QualificationConfigInput = {},
): DistributionDayRecord[] => {
  const rules = assertValid(QualificationConfigSchema, qualification, "QualificationConfig");
  assertChronological(series);

  const records: DistributionDayRecord[] = [];
  for (let i = 1; i < series.bars.length; i += 1) {
    const prev = series.bars[i - 1];
    const current = series.bars[i];
    if (!(current.close < prev.close && current.volume > prev.volume)) {
      continue;
    }

    const percentChange = current.close / prev.close - 1;
    const volumeChange = prev.volume === 0 ? 0 : current.volume / prev.volume - 1;
    const weightedChange = percentChange * (1 + volumeChange);

    if (-percentChange <= rules.minPercentDecline) {
      continue;
    }
    if (rules.weightedChangeThreshold !== null && !(weightedChange < rules.weightedChangeThreshold)) {
      continue;
    }

    records.push({
      date: current.date,
      sessionIndex: i,
      close: current.close,
      volume: current.volume,
      percentChange,
      volumeChange,
      weightedChange,
      expired: false,
      expirationReason: "none",
      expiredOn: null,
    });
  }
  return records;
};
