import {
  ConfigurationError,
  ExpirationConfigSchema,
  assertValid,
  countSessionsAfterLastBar,
  findSessionIndex,
  sessionDateAfterLastBar,
  type DistributionDayRecord,
  type ExpirationConfigInput,
  type ExpirationReason,
  type ISODate,
  type PriceSeries,
} from "@market-sentinel/sdk";

export interface ExpirationOptions extends ExpirationConfigInput {
  /** Session the log is evaluated at. Defaults to the last bar of the series. */
  readonly asOf?: ISODate;
}

/**
 * Resolves `asOf` to the last session dated on or before it.
 */
export const resolveAsOfIndex = (series: PriceSeries, asOf?: ISODate): number => {
  if (asOf === undefined) {
    return series.bars.length - 1;
  }
  const index = findSessionIndex(series, asOf);
  if (index < 0) {
    throw new ConfigurationError(`asOf ${asOf} precedes the first bar of ${series.symbol}`);
  }
  return index;
};

export interface ResolvedAsOf {
  /** Last bar on or before `asOf`. */
  readonly index: number;
  /** Weekday sessions between the last bar and an `asOf` beyond it. */
  readonly sessionsAfterLastBar: number;
  /** Session position of `asOf`, counting past the last bar. */
  readonly position: number;
  readonly date: ISODate;
}

/**
 * Like {@link resolveAsOfIndex}, but an `asOf` later than the last bar keeps the
 * weekday sessions that elapsed after it.
 */
export const resolveAsOf = (series: PriceSeries, asOf?: ISODate): ResolvedAsOf => {
  const index = resolveAsOfIndex(series, asOf);
  const sessionsAfterLastBar = asOf === undefined ? 0 : countSessionsAfterLastBar(series, asOf);
  return {
    index,
    sessionsAfterLastBar,
    position: index + sessionsAfterLastBar,
    date: sessionsAfterLastBar > 0 && asOf !== undefined ? asOf : series.bars[index].date,
  };
};

interface PendingRecord {
  readonly position: number;
  readonly sessionIndex: number;
  readonly recoveryLevel: number;
}

/**
 * Ages distribution days out of the active count. A record expires on the first
 * later session, up to `asOf`, where either the close recovered to
 * `(1 + recoveryThreshold)` times the record's close, or the record has spanned
 * more than `timeLimitSessions` sessions counting its own. Recovery is checked
 * before time on every session. Weekdays between the last bar and a later
 * `asOf` count toward the time limit.
 *
 * Runs as one forward pass over the bars; at most `timeLimitSessions` records
 * are pending at any session.
 *
 * @returns New records in input order; records dated after `asOf` stay unexpired.
 */
export const applyExpiration = (
  records: ReadonlyArray<DistributionDayRecord>,
  series: PriceSeries,
  options: ExpirationOptions = {},
): DistributionDayRecord[] => {
  const { asOf, ...thresholds } = options;
  const config = assertValid(ExpirationConfigSchema, thresholds, "ExpirationConfig");
  const resolved = resolveAsOf(series, asOf);
  const asOfIndex = resolved.index;

  const outcome = new Map<number, { reason: ExpirationReason; on: ISODate }>();
  const bySession = new Map<number, number[]>();
  records.forEach((record, position) => {
    const bar = series.bars[record.sessionIndex];
    if (!bar || bar.date !== record.date) {
      throw new ConfigurationError(
        `record ${record.date} does not belong to ${series.symbol} at session ${record.sessionIndex}`,
      );
    }
    const positions = bySession.get(record.sessionIndex) ?? [];
    positions.push(position);
    bySession.set(record.sessionIndex, positions);
  });

  const firstSession = records.reduce(
    (min, record) => Math.min(min, record.sessionIndex),
    Number.POSITIVE_INFINITY,
  );

  let pending: PendingRecord[] = [];
  for (let session = firstSession; session <= asOfIndex; session += 1) {
    const bar = series.bars[session];

    if (pending.length > 0) {
      const stillPending: PendingRecord[] = [];
      for (const entry of pending) {
        if (bar.close >= entry.recoveryLevel) {
          outcome.set(entry.position, { reason: "price_recovery", on: bar.date });
        } else if (session - entry.sessionIndex + 1 > config.timeLimitSessions) {
          outcome.set(entry.position, { reason: "time", on: bar.date });
        } else {
          stillPending.push(entry);
        }
      }
      pending = stillPending;
    }

    for (const position of bySession.get(session) ?? []) {
      const record = records[position];
      pending.push({
        position,
        sessionIndex: session,
        recoveryLevel: record.close * (1 + config.recoveryThreshold),
      });
    }
  }

  // Sessions past the last bar carry no prices, so only time can expire records.
  for (const entry of pending) {
    const overdue = resolved.position - entry.sessionIndex + 1 - config.timeLimitSessions;
    if (overdue > 0) {
      const crossedAt = entry.sessionIndex + config.timeLimitSessions;
      outcome.set(entry.position, {
        reason: "time",
        on: sessionDateAfterLastBar(series, crossedAt - asOfIndex),
      });
    }
  }

  return records.map((record, position): DistributionDayRecord => {
    const expiry = outcome.get(position);
    if (!expiry) {
      return { ...record, expired: false, expirationReason: "none", expiredOn: null };
    }
    return { ...record, expired: true, expirationReason: expiry.reason, expiredOn: expiry.on };
  });
};
