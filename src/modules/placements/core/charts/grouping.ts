import type { ChartResult, CorrelationStrength } from './types.js';
import type { PlacementRecord } from '../types.js';

/**
 * Groups rows by key, preserving first-seen key order.
 */
export const groupRows = <K>(
  rows: readonly PlacementRecord[],
  keyOf: (row: PlacementRecord) => K
): Map<K, PlacementRecord[]> => {
  const groups = new Map<K, PlacementRecord[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = groups.get(key);
    if (bucket === undefined) {
      groups.set(key, [row]);
    } else {
      bucket.push(row);
    }
  }
  return groups;
};

export const emptyChart = <T>(): ChartResult<T> => ({ data: null, insight: '' });

/**
 * First element with the largest score (ties keep the earlier element).
 */
export const firstMax = <T>(items: readonly T[], score: (item: T) => number): T | undefined => {
  let best: T | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const item of items) {
    const s = score(item);
    if (best === undefined || s > bestScore) {
      best = item;
      bestScore = s;
    }
  }
  return best;
};

export const firstMin = <T>(items: readonly T[], score: (item: T) => number): T | undefined =>
  firstMax(items, (item) => -score(item));

/** Insights need at least this many rows before a correlation is reported. */
export const MIN_ROWS_FOR_CORRELATION = 4;

/**
 * Strength label for a Pearson r: |r| > 0.7 strong, > 0.4 moderate.
 */
export const classifyCorrelation = (r: number): CorrelationStrength => {
  const magnitude = Math.abs(r);
  if (magnitude > 0.7) return 'strong';
  if (magnitude > 0.4) return 'moderate';
  return 'weak';
};

/**
 * Strength label for R²: > 0.6 strong, > 0.3 moderate.
 * Deliberately not the same scale as `classifyCorrelation`.
 */
export const classifyRSquared = (rSquared: number): CorrelationStrength => {
  if (rSquared > 0.6) return 'strong';
  if (rSquared > 0.3) return 'moderate';
  return 'weak';
};

export const correlationDirection = (r: number): 'positive' | 'negative' =>
  r < 0 ? 'negative' : 'positive';
