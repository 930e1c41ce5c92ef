import { emptyChart, firstMax, firstMin, groupRows } from './grouping.js';
import { compareStrings, formatFixed, meanOf } from '../numeric.js';

import type { ChartBuilder, PlacementTrendData, PlacementTrendPoint } from './types.js';

/**
 * Mean placement % per (year, branch), one line per branch.
 */
export const buildPlacementTrend: ChartBuilder<PlacementTrendData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const groups = groupRows(dataset, (r) => `${String(r.year)}|${r.branch}`);
  const points: PlacementTrendPoint[] = [];
  for (const rows of groups.values()) {
    const first = rows[0];
    const mean = meanOf(rows.map((r) => r.placementPercentage));
    if (first === undefined || mean === null) continue;
    points.push({ year: first.year, branch: first.branch, placementPct: mean });
  }
  points.sort((a, b) => a.year - b.year || compareStrings(a.branch, b.branch));

  const best = firstMax(points, (p) => p.placementPct);
  const worst = firstMin(points, (p) => p.placementPct);
  if (best === undefined || worst === undefined) {
    return { data: { points }, insight: '' };
  }

  return {
    data: { points },
    insight:
      `${best.branch} reached the highest placement rate of ${formatFixed(best.placementPct, 1)}% ` +
      `in ${String(best.year)}. ${worst.branch} had the lowest at ` +
      `${formatFixed(worst.placementPct, 1)}% in ${String(worst.year)}.`,
  };
};
