import { emptyChart, groupRows } from './grouping.js';
import { formatFixed, maxOf, meanOf, medianOf, minOf, roundHalfUp } from '../numeric.js';

import type { ChartBuilder, PackageTrendData, PackageTrendRow } from './types.js';

const round2 = (value: number | null): number | null =>
  value === null ? null : roundHalfUp(value, 2);

/**
 * Highest / average / median / lowest package per year.
 */
export const buildPackageTrend: ChartBuilder<PackageTrendData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const years: PackageTrendRow[] = [...groupRows(dataset, (r) => r.year).entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, rows]) => ({
      year,
      highest: round2(maxOf(rows.map((r) => r.highestPackageLpa))),
      average: round2(meanOf(rows.map((r) => r.avgPackageLpa))),
      median: round2(medianOf(rows.map((r) => r.medianPackageLpa))),
      lowest: round2(minOf(rows.map((r) => r.lowestPackageLpa))),
    }));

  const first = years[0];
  const last = years.at(-1);
  if (
    years.length < 2 ||
    first === undefined ||
    last === undefined ||
    first.average === null ||
    last.average === null
  ) {
    return { data: { years }, insight: '' };
  }

  const growth = ((last.average - first.average) / Math.max(first.average, 0.01)) * 100;

  return {
    data: { years },
    insight:
      `Average packages grew ${formatFixed(growth, 0)}% from ${String(first.year)} to ` +
      `${String(last.year)}, reaching ${formatFixed(last.average, 1)} LPA.`,
  };
};
