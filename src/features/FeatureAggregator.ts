import { getHours, getISODay, getMinutes, getSeconds } from 'date-fns';
import {
  FEATURE_COLUMNS,
  FeatureMatrix,
  SenderFeatureRow
} from '../types/index.js';
import { getStageLogger } from '../utils/logger.js';

const log = getStageLogger('features');

/**
 * Seconds elapsed since local midnight
 */
export function secondsSinceMidnight(date: Date): number {
  return getHours(date) * 3600 + getMinutes(date) * 60 + getSeconds(date);
}

/**
 * Weekday index with Monday = 0 ... Sunday = 6
 */
export function weekdayIndex(date: Date): number {
  return getISODay(date) - 1;
}

/**
 * Rounded mean of a per-date quantity, computed for each sender on its own
 */
function roundedMeanPerSender(
  datetimesPerSender: ReadonlyMap<string, readonly Date[]>,
  quantity: (date: Date) => number
): Map<string, number> {
  const result = new Map<string, number>();

  for (const [sender, datetimes] of datetimesPerSender) {
    if (datetimes.length === 0) {
      continue;
    }
    let total = 0;
    for (const date of datetimes) {
      total += quantity(date);
    }
    result.set(sender, Math.round(total / datetimes.length));
  }

  return result;
}

/**
 * Average time of day per sender, in seconds since midnight
 */
export function averageSecondsSinceMidnight(
  datetimesPerSender: ReadonlyMap<string, readonly Date[]>
): Map<string, number> {
  return roundedMeanPerSender(datetimesPerSender, secondsSinceMidnight);
}

/**
 * Average weekday per sender, rounded to the nearest weekday index
 */
export function averageWeekday(
  datetimesPerSender: ReadonlyMap<string, readonly Date[]>
): Map<string, number> {
  return roundedMeanPerSender(datetimesPerSender, weekdayIndex);
}

/**
 * Most frequent weekday per sender. When several weekdays share the highest
 * count, the result is the rounded mean of those weekdays.
 *
 * Not part of the default feature set.
 */
export function mostFrequentWeekday(
  datetimesPerSender: ReadonlyMap<string, readonly Date[]>
): Map<string, number> {
  const result = new Map<string, number>();

  for (const [sender, datetimes] of datetimesPerSender) {
    const counts = new Map<number, number>();
    for (const date of datetimes) {
      const weekday = weekdayIndex(date);
      counts.set(weekday, (counts.get(weekday) ?? 0) + 1);
    }
    if (counts.size === 0) {
      continue;
    }

    const maximum = Math.max(...counts.values());
    const tied = [...counts.entries()]
      .filter(([, count]) => count === maximum)
      .map(([weekday]) => weekday);

    result.set(sender, Math.round(tied.reduce((sum, weekday) => sum + weekday, 0) / tied.length));
  }

  return result;
}

/**
 * Builds one feature row per sender, in the order of `mailsPerSender`
 */
export function aggregateFeatures(
  mailsPerSender: ReadonlyMap<string, number>,
  datetimesPerSender: ReadonlyMap<string, readonly Date[]>
): SenderFeatureRow[] {
  const averageTimes = averageSecondsSinceMidnight(datetimesPerSender);
  const averageWeekdays = averageWeekday(datetimesPerSender);

  const rows: SenderFeatureRow[] = [];
  for (const [sender, mailCount] of mailsPerSender) {
    const avgSecondsSinceMidnight = averageTimes.get(sender);
    const avgWeekday = averageWeekdays.get(sender);
    if (avgSecondsSinceMidnight === undefined || avgWeekday === undefined) {
      log.warn('Sender has a message count but no timestamps, leaving it out', { sender });
      continue;
    }
    rows.push({
      sender,
      mailCount,
      avgSecondsSinceMidnight,
      avgWeekday
    });
  }

  log.debug('Feature rows aggregated', { rows: rows.length });
  return rows;
}

export function toFeatureMatrix(rows: readonly SenderFeatureRow[]): FeatureMatrix {
  return {
    identifiers: rows.map((row) => row.sender),
    columns: FEATURE_COLUMNS,
    rows: rows.map((row) => FEATURE_COLUMNS.map((column) => row[column]))
  };
}

/**
 * Min-max scales every column to [0, 1] and returns a new matrix.
 * A column whose values are all equal scales to 0.
 */
export function minMaxScale(matrix: FeatureMatrix): FeatureMatrix {
  const columnCount = matrix.columns.length;
  const minimums = new Array<number>(columnCount).fill(Infinity);
  const maximums = new Array<number>(columnCount).fill(-Infinity);

  for (const row of matrix.rows) {
    row.forEach((value, column) => {
      minimums[column] = Math.min(minimums[column], value);
      maximums[column] = Math.max(maximums[column], value);
    });
  }

  const rows = matrix.rows.map((row) =>
    row.map((value, column) => {
      const range = maximums[column] - minimums[column];
      return range === 0 ? 0 : (value - minimums[column]) / range;
    })
  );

  return {
    identifiers: [...matrix.identifiers],
    columns: matrix.columns,
    rows
  };
}
