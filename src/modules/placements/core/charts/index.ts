import { buildBranchRanking } from './branch-ranking.js';
import { buildInternshipVsPlacement } from './internship-vs-placement.js';
import { buildPackageSpread } from './package-spread.js';
import { buildPackageTrend } from './package-trend.js';
import { buildPackageVsPlacement } from './package-vs-placement.js';
import { buildPlacedByYear } from './placed-by-year.js';
import { buildPlacementHeatmap } from './placement-heatmap.js';
import { buildPlacementTrend } from './placement-trend.js';
import { buildRoleDistribution } from './role-distribution.js';
import { buildTopRecruiters } from './top-recruiters.js';

import type { ChartId, DashboardCharts } from './types.js';
import type { PlacementDataset } from '../types.js';

export * from './types.js';
export { classifyCorrelation, classifyRSquared } from './grouping.js';
export {
  buildBranchRanking,
  buildInternshipVsPlacement,
  buildPackageSpread,
  buildPackageTrend,
  buildPackageVsPlacement,
  buildPlacedByYear,
  buildPlacementHeatmap,
  buildPlacementTrend,
  buildRoleDistribution,
  buildTopRecruiters,
};

/** Display order and titles, shared by the dashboard and the report. */
export const CHART_TITLES: Readonly<Record<ChartId, string>> = {
  placementTrend: 'Placement Rate Trend by Branch',
  placedByYear: 'Placed vs Unplaced Students by Year',
  branchRanking: 'Branch-wise Placement Rate',
  packageSpread: 'Package Distribution by Branch',
  packageTrend: 'Salary Package Trends',
  packageVsPlacement: 'Average Package vs Placement Rate',
  topRecruiters: 'Top Recruiters',
  roleDistribution: 'Job Role Distribution',
  internshipVsPlacement: 'Internship Conversion vs Placement Rate',
  placementHeatmap: 'Placement Rate Heatmap',
};

export const CHART_IDS: readonly ChartId[] = [
  'placementTrend',
  'placedByYear',
  'branchRanking',
  'packageSpread',
  'packageTrend',
  'packageVsPlacement',
  'topRecruiters',
  'roleDistribution',
  'internshipVsPlacement',
  'placementHeatmap',
];

/**
 * Runs every builder. The builders are independent of each other.
 */
export const buildAllCharts = (dataset: PlacementDataset): DashboardCharts => ({
  placementTrend: buildPlacementTrend(dataset),
  placedByYear: buildPlacedByYear(dataset),
  branchRanking: buildBranchRanking(dataset),
  packageSpread: buildPackageSpread(dataset),
  packageTrend: buildPackageTrend(dataset),
  packageVsPlacement: buildPackageVsPlacement(dataset),
  topRecruiters: buildTopRecruiters(dataset),
  roleDistribution: buildRoleDistribution(dataset),
  internshipVsPlacement: buildInternshipVsPlacement(dataset),
  placementHeatmap: buildPlacementHeatmap(dataset),
});
