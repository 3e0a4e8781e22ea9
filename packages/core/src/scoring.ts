/**
 * Scoring primitives shared by every category scorer
 */

import { InvalidRangeError, RecordValidationError } from './errors.js';
import { DEFAULT_MAX_DATE_DIFF_DAYS } from './config.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Leading calendar date of an ISO-8601 string
const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?!\d)/;
const ISO_LIKE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/**
 * Linear score from 1.0 at minValue down to 0.0 at maxValue.
 * The result is clamped to [minValue, maxValue] before scaling.
 */
export function slopeScore(result: number, minValue: number, maxValue: number): number {
  if (minValue === maxValue) {
    throw new InvalidRangeError('Minimum and maximum thresholds must be different');
  }
  if (minValue > maxValue) {
    throw new InvalidRangeError('Minimum threshold must be less than maximum threshold');
  }

  const slope = maxValue - minValue;
  const clamped = Math.max(Math.min(result, maxValue), minValue);
  return 1 - (clamped - minValue) / slope;
}

/**
 * 0/1 categorical match.
 * gsrValue may hold several acceptable values; a wildcard among them matches anything.
 */
export function facetScore<T>(
  warnValue: T,
  gsrValue: T | readonly T[],
  wildcards: readonly T[] = []
): 0 | 1 {
  const acceptable: readonly T[] = isList(gsrValue) ? gsrValue : [gsrValue];

  if (wildcards.some((wildcard) => acceptable.includes(wildcard))) {
    return 1;
  }
  return acceptable.includes(warnValue) ? 1 : 0;
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Calendar day number (days since 1970-01-01) of a date string.
 * A leading YYYY-MM-DD is read literally so time zones never shift the day.
 */
export function toDayNumber(date: string): number {
  const trimmed = date.trim();
  const iso = ISO_DATE_PREFIX.exec(trimmed);
  if (iso) {
    const [year, month, day] = iso.slice(1, 4).map(Number);
    const utc = new Date(Date.UTC(year, month - 1, day));
    // Date.UTC rolls overflowing fields forward (Feb 30 -> Mar 2)
    if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
      throw new RecordValidationError(`Invalid calendar date: ${JSON.stringify(date)}`);
    }
    return Math.round(utc.getTime() / MS_PER_DAY);
  }
  if (ISO_LIKE_PREFIX.test(trimmed)) {
    throw new RecordValidationError(`Unparseable date: ${JSON.stringify(date)}`);
  }

  const parsed = new Date(date);
  if (Number.isNaN(parsed.getTime())) {
    throw new RecordValidationError(`Unparseable date: ${JSON.stringify(date)}`);
  }
  return Math.round(Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()) / MS_PER_DAY);
}

/**
 * Normalized YYYY-MM-DD form of a date string
 */
export function toDateKey(date: string): string {
  return new Date(toDayNumber(date) * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Signed day count gsrDate - warnDate.
 * Negative values mean the warning was later than the event.
 */
export function dateDiff(warnDate: string, gsrDate: string): number {
  return toDayNumber(gsrDate) - toDayNumber(warnDate);
}

/**
 * Date score, with an absolute difference of maxDiff days scoring 0
 */
export function dateScore(diffDays: number, maxDiff: number = DEFAULT_MAX_DATE_DIFF_DAYS): number {
  return slopeScore(Math.abs(diffDays), 0, maxDiff);
}

/**
 * Harmonic mean of precision and recall
 */
export function f1(precision: number, recall: number): number {
  if (!(precision >= 0 && precision <= 1)) {
    throw new InvalidRangeError('Precision must be in the range 0.0 to 1.0');
  }
  if (!(recall >= 0 && recall <= 1)) {
    throw new InvalidRangeError('Recall must be in the range 0.0 to 1.0');
  }
  if (precision === 0 && recall === 0) {
    return 0;
  }
  return (2 * precision * recall) / (precision + recall);
}

/**
 * Arithmetic mean; 0 for an empty list
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
}

/**
 * Value matrices for pairwise comparisons.
 * rows[i][j] = rowValues[i], cols[i][j] = colValues[j]
 */
export function makeCombinationMats<R, C>(
  rowValues: readonly R[],
  colValues: readonly C[]
): [rows: R[][], cols: C[][]] {
  const rows = rowValues.map((rowValue) => colValues.map(() => rowValue));
  const cols = rowValues.map(() => [...colValues]);
  return [rows, cols];
}

/**
 * Index matrices for pairwise comparisons.
 * rows[i][j] = i, cols[i][j] = j
 */
export function makeIndexMats(
  rowValues: readonly unknown[],
  colValues: readonly unknown[]
): [rows: number[][], cols: number[][]] {
  return makeCombinationMats(
    rowValues.map((_, i) => i),
    colValues.map((_, j) => j)
  );
}
