import { emptyChart, firstMax, groupRows } from './grouping.js';
import { compareStrings, formatFixed, meanOf, roundHalfUp } from '../numeric.js';

import type { ChartBuilder, PlacementHeatmapData } from './types.js';

/**
 * Branch × year grid of mean placement %.
 */
export const buildPlacementHeatmap: ChartBuilder<PlacementHeatmapData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const rated = dataset.filter((r) => r.placementPercentage !== null);
  const years = [...new Set(rated.map((r) => r.year))].sort((a, b) => a - b);
  const byBranch = [...groupRows(rated, (r) => r.branch).entries()].sort(([a], [b]) =>
    compareStrings(a, b)
  );

  const rows = byBranch
    .map(([branch, branchRows]) => {
      const cells = years.map((year) => {
        const mean = meanOf(
          branchRows.filter((r) => r.year === year).map((r) => r.placementPercentage)
        );
        return mean === null ? null : roundHalfUp(mean, 1);
      });
      return { branch, cells, rowMean: meanOf(cells) ?? 0 };
    })
    .sort((a, b) => b.rowMean - a.rowMean);

  const data: PlacementHeatmapData = {
    branches: rows.map((r) => r.branch),
    years,
    cells: rows.map((r) => r.cells),
  };

  const firstYear = years[0];
  const lastYear = years.at(-1);
  if (years.length < 2 || firstYear === undefined || lastYear === undefined) {
    return { data, insight: '' };
  }

  const gains: { branch: string; gain: number }[] = [];
  for (const row of rows) {
    const first = row.cells[0];
    const last = row.cells.at(-1);
    if (first === null || first === undefined || last === null || last === undefined) continue;
    gains.push({ branch: row.branch, gain: last - first });
  }

  const best = firstMax(gains, (g) => g.gain);
  if (best === undefined) {
    return { data, insight: '' };
  }

  return {
    data,
    insight:
      `${best.branch} showed the most improvement, gaining ${formatFixed(best.gain, 1)} ` +
      `percentage points from ${String(firstYear)} to ${String(lastYear)}.`,
  };
};
