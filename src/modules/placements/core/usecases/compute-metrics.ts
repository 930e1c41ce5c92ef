import { Decimal } from 'decimal.js';

import { formatCount, formatFixed, percentChange, ratioPct, roundHalfUp, sumOf } from '../numeric.js';

import type { DerivedMetrics, KpiCard, PlacementDataset, PlacementRecord } from '../types.js';

export const EMPTY_METRICS: DerivedMetrics = {
  totalPlaced: 0,
  totalStudents: 0,
  overallPlacementPct: 0,
  highestPackage: 0,
  highestPackageBranch: 'N/A',
  weightedAvgPackage: 0,
  yoyPlacedChange: null,
  yoyAvgPackageChange: null,
  placementPctDelta: null,
};

const totalPlacedOf = (rows: readonly PlacementRecord[]): number =>
  sumOf(rows.map((r) => r.placedStudents));

const totalStudentsOf = (rows: readonly PlacementRecord[]): number =>
  sumOf(rows.map((r) => r.totalStudents));

/**
 * Σ(avg package × placed) / max(Σ placed, 1), unrounded.
 * Rows missing either factor add nothing to the numerator.
 */
export const placedWeightedAverage = (rows: readonly PlacementRecord[]): number => {
  let numerator = new Decimal(0);
  for (const row of rows) {
    if (row.avgPackageLpa !== null && row.placedStudents !== null) {
      numerator = numerator.plus(new Decimal(row.avgPackageLpa).mul(row.placedStudents));
    }
  }
  return numerator.div(Math.max(totalPlacedOf(rows), 1)).toNumber();
};

/**
 * First row holding the maximum highest package, in dataset order.
 */
const findHighestPackage = (
  rows: PlacementDataset
): { value: number; branch: string } | undefined => {
  let best: { value: number; branch: string } | undefined;
  for (const row of rows) {
    if (row.highestPackageLpa === null) continue;
    if (best === undefined || row.highestPackageLpa > best.value) {
      best = { value: row.highestPackageLpa, branch: row.branch };
    }
  }
  return best;
};

interface YearOverYear {
  yoyPlacedChange: number | null;
  yoyAvgPackageChange: number | null;
  placementPctDelta: number | null;
}

const NO_YEAR_OVER_YEAR: YearOverYear = {
  yoyPlacedChange: null,
  yoyAvgPackageChange: null,
  placementPctDelta: null,
};

/**
 * Compares the two highest years present in `rows`.
 *
 * "Previous" is whatever year comes second after filtering, so with an
 * intermediate year filtered out the comparison spans a gap.
 */
const computeYearOverYear = (rows: PlacementDataset): YearOverYear => {
  const years = [...new Set(rows.map((r) => r.year))].sort((a, b) => a - b);
  const latest = years.at(-1);
  const previous = years.at(-2);
  if (latest === undefined || previous === undefined) {
    return NO_YEAR_OVER_YEAR;
  }

  const cur = rows.filter((r) => r.year === latest);
  const prv = rows.filter((r) => r.year === previous);

  const curPlaced = totalPlacedOf(cur);
  const prvPlaced = totalPlacedOf(prv);
  const placedChange = percentChange(curPlaced, prvPlaced);

  const avgChange = percentChange(placedWeightedAverage(cur), placedWeightedAverage(prv));

  const prvTotal = totalStudentsOf(prv);
  let pctDelta: number | null = null;
  if (prvTotal !== 0) {
    const prvPct = roundHalfUp(ratioPct(prvPlaced, prvTotal), 1);
    const curPct = roundHalfUp(ratioPct(curPlaced, Math.max(totalStudentsOf(cur), 1)), 1);
    pctDelta = roundHalfUp(curPct - prvPct, 1);
  }

  return {
    yoyPlacedChange: placedChange === null ? null : roundHalfUp(placedChange, 1),
    yoyAvgPackageChange: avgChange === null ? null : roundHalfUp(avgChange, 1),
    placementPctDelta: pctDelta,
  };
};

/**
 * Aggregate KPIs for a (filtered) dataset. Total: an empty input yields
 * zeros, "N/A" and null deltas.
 */
export const computeMetrics = (dataset: PlacementDataset): DerivedMetrics => {
  if (dataset.length === 0) {
    return { ...EMPTY_METRICS };
  }

  const totalPlaced = totalPlacedOf(dataset);
  const totalStudents = totalStudentsOf(dataset);
  const highest = findHighestPackage(dataset);

  return {
    totalPlaced,
    totalStudents,
    overallPlacementPct: roundHalfUp(ratioPct(totalPlaced, totalStudents), 1),
    highestPackage: highest?.value ?? 0,
    highestPackageBranch: highest?.branch ?? 'N/A',
    weightedAvgPackage: roundHalfUp(placedWeightedAverage(dataset), 2),
    ...computeYearOverYear(dataset),
  };
};

const formatDelta = (value: number | null, suffix: string): string | null => {
  if (value === null) return null;
  const sign = value > 0 ? '+' : '';
  return `${sign}${formatFixed(value, 1)}${suffix}`;
};

/**
 * The four headline KPI cards shown above the charts.
 */
export const formatKpis = (metrics: DerivedMetrics): KpiCard[] => [
  {
    label: 'Total Placements',
    value: formatCount(metrics.totalPlaced),
    delta: formatDelta(metrics.yoyPlacedChange, '%'),
  },
  {
    label: 'Placement Rate',
    value: `${formatFixed(metrics.overallPlacementPct, 1)}%`,
    delta: formatDelta(metrics.placementPctDelta, ' pp'),
  },
  {
    label: 'Highest Package',
    value: `${String(metrics.highestPackage)} LPA`,
    delta: metrics.highestPackageBranch,
  },
  {
    label: 'Avg Package',
    value: `${formatFixed(metrics.weightedAvgPackage, 2)} LPA`,
    delta: formatDelta(metrics.yoyAvgPackageChange, '%'),
  },
];
