import { Metric } from '../types/index.js';
import { InputError } from '../errors/AnalysisError.js';

export const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Distance between two message counts
 */
export function mailCountDistance(count1: number, count2: number): number {
  return Math.abs(count1 - count2);
}

/**
 * Distance between two times of day on a one-day circle, in seconds.
 * The largest possible value is half a day (43200).
 */
export function secondsDistance(seconds1: number, seconds2: number): number {
  return Math.min(
    positiveModulo(seconds1 - seconds2, SECONDS_PER_DAY),
    positiveModulo(seconds2 - seconds1, SECONDS_PER_DAY)
  );
}

/**
 * Distance between two weekday indices.
 * Linear: Sunday (6) and Monday (0) are six days apart, not one.
 */
export function weekdayDistance(weekday1: number, weekday2: number): number {
  return Math.abs(weekday1 - weekday2);
}

/**
 * Product metric over (mail count, seconds since midnight, weekday):
 * the Euclidean combination of the three per-feature distances.
 */
export const compositeDistance: Metric = (a, b) => {
  if (a.length !== 3 || b.length !== 3) {
    throw new InputError(
      `composite distance expects two 3-feature vectors, got lengths ${a.length} and ${b.length}`
    );
  }

  const [mailCount1, seconds1, weekday1] = a;
  const [mailCount2, seconds2, weekday2] = b;

  const dCount = mailCountDistance(mailCount1, mailCount2);
  const dTime = secondsDistance(seconds1, seconds2);
  const dWeekday = weekdayDistance(weekday1, weekday2);

  return Math.sqrt(dCount ** 2 + dTime ** 2 + dWeekday ** 2);
};

function positiveModulo(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}
