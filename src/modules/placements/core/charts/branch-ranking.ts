import { emptyChart, groupRows } from './grouping.js';
import { compareStrings, formatFixed, ratioPct, roundHalfUp, sumOf } from '../numeric.js';

import type { BranchRankingData, BranchRankingRow, ChartBuilder, PlacementTier } from './types.js';

const tierFor = (pct: number): PlacementTier => {
  if (pct >= 80) return 'high';
  if (pct >= 60) return 'medium';
  return 'low';
};

/**
 * Placed / total per branch, ascending.
 */
export const buildBranchRanking: ChartBuilder<BranchRankingData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const branches: BranchRankingRow[] = [...groupRows(dataset, (r) => r.branch).entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([branch, rows]) => {
      const placed = sumOf(rows.map((r) => r.placedStudents));
      const total = sumOf(rows.map((r) => r.totalStudents));
      const placementPct = roundHalfUp(ratioPct(placed, total), 1);
      return { branch, placed, total, placementPct, tier: tierFor(placementPct) };
    })
    .sort((a, b) => a.placementPct - b.placementPct);

  const bottom = branches[0];
  const top = branches.at(-1);
  if (bottom === undefined || top === undefined) {
    return { data: { branches }, insight: '' };
  }

  return {
    data: { branches },
    insight:
      `${top.branch} leads with ${formatFixed(top.placementPct, 1)}% placement rate, ` +
      `while ${bottom.branch} trails at ${formatFixed(bottom.placementPct, 1)}%.`,
  };
};
