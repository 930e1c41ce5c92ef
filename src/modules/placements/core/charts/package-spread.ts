import { emptyChart, firstMax, groupRows } from './grouping.js';
import { compareStrings, formatFixed, meanOf } from '../numeric.js';

import type { ChartBuilder, PackageKind, PackageSpreadData, PackageSpreadEntry } from './types.js';
import type { PlacementRecord } from '../types.js';

const PACKAGE_COLUMNS: readonly [PackageKind, (r: PlacementRecord) => number | null][] = [
  ['Lowest', (r) => r.lowestPackageLpa],
  ['Median', (r) => r.medianPackageLpa],
  ['Avg', (r) => r.avgPackageLpa],
  ['Highest', (r) => r.highestPackageLpa],
];

/**
 * The four package columns unpivoted to long form, for box plots per branch.
 */
export const buildPackageSpread: ChartBuilder<PackageSpreadData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const entries: PackageSpreadEntry[] = [];
  for (const row of dataset) {
    for (const [kind, read] of PACKAGE_COLUMNS) {
      const packageLpa = read(row);
      if (packageLpa !== null) entries.push({ branch: row.branch, kind, packageLpa });
    }
  }

  const medians: { branch: string; mean: number }[] = [];
  const byBranch = [...groupRows(dataset, (r) => r.branch).entries()].sort(([a], [b]) =>
    compareStrings(a, b)
  );
  for (const [branch, rows] of byBranch) {
    const mean = meanOf(rows.map((r) => r.medianPackageLpa));
    if (mean !== null) medians.push({ branch, mean });
  }

  const best = firstMax(medians, (m) => m.mean);
  if (best === undefined) {
    return { data: { entries }, insight: '' };
  }

  return {
    data: { entries },
    insight:
      `${best.branch} offers the highest median package at ${formatFixed(best.mean, 1)} LPA ` +
      'on average across the selected years.',
  };
};
