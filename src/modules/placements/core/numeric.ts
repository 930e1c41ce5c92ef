import { Decimal } from 'decimal.js';

const COUNT_FORMAT = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Rounds half-up (away from zero on ties) to `places` decimals.
 * Works on the shortest decimal representation of the float, so 1.005 → 1.01.
 */
export const roundHalfUp = (value: number, places: number): number =>
  new Decimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();

/**
 * Fixed-point string with half-up rounding, e.g. `formatFixed(12.345, 1) === '12.3'`.
 */
export const formatFixed = (value: number, places: number): string =>
  new Decimal(value).toFixed(places, Decimal.ROUND_HALF_UP);

/**
 * Integer with en-US thousands separators, e.g. `1,234`.
 */
export const formatCount = (value: number): string => COUNT_FORMAT.format(value);

/**
 * Sum that treats missing cells as zero.
 */
export const sumOf = (values: Iterable<number | null>): number => {
  let total = new Decimal(0);
  for (const value of values) {
    if (value !== null) total = total.plus(value);
  }
  return total.toNumber();
};

export const presentValues = (values: Iterable<number | null>): number[] => {
  const out: number[] = [];
  for (const value of values) {
    if (value !== null) out.push(value);
  }
  return out;
};

/**
 * Mean of the present values; `null` when there are none.
 */
export const meanOf = (values: Iterable<number | null>): number | null => {
  const present = presentValues(values);
  if (present.length === 0) return null;
  return new Decimal(sumOf(present)).div(present.length).toNumber();
};

export const medianOf = (values: Iterable<number | null>): number | null => {
  const sorted = presentValues(values).sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid];
  if (upper === undefined) return null;
  if (sorted.length % 2 === 1) return upper;

  const lower = sorted[mid - 1];
  return lower === undefined ? upper : (lower + upper) / 2;
};

const extremeOf = (
  values: Iterable<number | null>,
  pick: (a: number, b: number) => number
): number | null => {
  let result: number | null = null;
  for (const value of values) {
    if (value !== null) result = result === null ? value : pick(result, value);
  }
  return result;
};

export const maxOf = (values: Iterable<number | null>): number | null =>
  extremeOf(values, Math.max);

export const minOf = (values: Iterable<number | null>): number | null =>
  extremeOf(values, Math.min);

/**
 * Relative change in percent: (current - previous) / previous * 100.
 * `null` when previous is zero.
 */
export const percentChange = (current: number, previous: number): number | null => {
  if (previous === 0) return null;
  return new Decimal(current).minus(previous).div(previous).mul(100).toNumber();
};

/**
 * Ratio in percent with a zero-denominator guard returning 0.
 */
export const ratioPct = (numerator: number, denominator: number): number => {
  if (denominator === 0) return 0;
  return new Decimal(numerator).div(denominator).mul(100).toNumber();
};

export interface Pair {
  x: number;
  y: number;
}

/**
 * Collects (x, y) pairs where both sides are present.
 */
export const completePairs = <T>(
  items: readonly T[],
  x: (item: T) => number | null,
  y: (item: T) => number | null
): Pair[] => {
  const pairs: Pair[] = [];
  for (const item of items) {
    const xv = x(item);
    const yv = y(item);
    if (xv !== null && yv !== null) pairs.push({ x: xv, y: yv });
  }
  return pairs;
};

/**
 * Pearson correlation coefficient.
 * `null` with fewer than two pairs or when either side has zero variance.
 */
export const pearson = (pairs: readonly Pair[]): number | null => {
  const n = pairs.length;
  if (n < 2) return null;

  const meanX = pairs.reduce((acc, p) => acc + p.x, 0) / n;
  const meanY = pairs.reduce((acc, p) => acc + p.y, 0) / n;

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (const p of pairs) {
    const dx = p.x - meanX;
    const dy = p.y - meanY;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
};

export interface LinearFit {
  slope: number;
  intercept: number;
}

/**
 * Ordinary least-squares line y = slope·x + intercept.
 * `null` with fewer than two pairs or when x has zero variance.
 */
export const linearFit = (pairs: readonly Pair[]): LinearFit | null => {
  const n = pairs.length;
  if (n < 2) return null;

  const meanX = pairs.reduce((acc, p) => acc + p.x, 0) / n;
  const meanY = pairs.reduce((acc, p) => acc + p.y, 0) / n;

  let sxy = 0;
  let sxx = 0;
  for (const p of pairs) {
    sxy += (p.x - meanX) * (p.y - meanY);
    sxx += (p.x - meanX) ** 2;
  }

  if (sxx === 0) return null;
  const slope = sxy / sxx;
  return { slope, intercept: meanY - slope * meanX };
};

/**
 * Code-point string comparison, matching how the dataset is sorted.
 */
export const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
