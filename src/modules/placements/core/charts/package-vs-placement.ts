import {
  MIN_ROWS_FOR_CORRELATION,
  classifyCorrelation,
  correlationDirection,
  emptyChart,
} from './grouping.js';
import { completePairs, formatFixed, medianOf, pearson } from '../numeric.js';

import type { ChartBuilder, PackageVsPlacementData, PackageVsPlacementPoint } from './types.js';

/**
 * Average package against placement %, one point per row, with median
 * reference lines on both axes.
 */
export const buildPackageVsPlacement: ChartBuilder<PackageVsPlacementData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const points: PackageVsPlacementPoint[] = [];
  for (const row of dataset) {
    if (row.avgPackageLpa === null || row.placementPercentage === null) continue;
    points.push({
      year: row.year,
      branch: row.branch,
      avgPackageLpa: row.avgPackageLpa,
      placementPct: row.placementPercentage,
      totalStudents: row.totalStudents,
      placedStudents: row.placedStudents,
    });
  }

  const correlation = pearson(
    completePairs(
      dataset,
      (r) => r.avgPackageLpa,
      (r) => r.placementPercentage
    )
  );

  const data: PackageVsPlacementData = {
    points,
    medianAvgPackageLpa: medianOf(dataset.map((r) => r.avgPackageLpa)),
    medianPlacementPct: medianOf(dataset.map((r) => r.placementPercentage)),
    correlation,
  };

  if (dataset.length < MIN_ROWS_FOR_CORRELATION || correlation === null) {
    return { data, insight: '' };
  }

  return {
    data,
    insight:
      `There is a ${classifyCorrelation(correlation)} ${correlationDirection(correlation)} ` +
      `correlation (r = ${formatFixed(correlation, 2)}) between average package and placement rate.`,
  };
};
