import type { PlacementDataset } from '../types.js';

/**
 * Output of every chart builder: chart-ready data (or `null` when there is
 * nothing to draw) plus a one-sentence insight (possibly empty).
 */
export interface ChartResult<T> {
  data: T | null;
  insight: string;
}

export type ChartBuilder<T> = (dataset: PlacementDataset) => ChartResult<T>;

export type CorrelationStrength = 'strong' | 'moderate' | 'weak';

// 1. Placement trend
export interface PlacementTrendPoint {
  year: number;
  branch: string;
  placementPct: number;
}

export interface PlacementTrendData {
  points: PlacementTrendPoint[];
}

// 2. Placed vs unplaced by year
export interface PlacedByYearRow {
  year: number;
  placed: number;
  unplaced: number;
  total: number;
  placedPct: number;
}

export interface PlacedByYearData {
  years: PlacedByYearRow[];
}

// 3. Branch ranking
export type PlacementTier = 'high' | 'medium' | 'low';

export interface BranchRankingRow {
  branch: string;
  placed: number;
  total: number;
  placementPct: number;
  tier: PlacementTier;
}

export interface BranchRankingData {
  /** Ascending by placement %, so the best branch ends up on top of a horizontal bar chart */
  branches: BranchRankingRow[];
}

// 4. Package spread
export type PackageKind = 'Lowest' | 'Median' | 'Avg' | 'Highest';

export interface PackageSpreadEntry {
  branch: string;
  kind: PackageKind;
  packageLpa: number;
}

export interface PackageSpreadData {
  entries: PackageSpreadEntry[];
}

// 5. Package trend
export interface PackageTrendRow {
  year: number;
  highest: number | null;
  average: number | null;
  median: number | null;
  lowest: number | null;
}

export interface PackageTrendData {
  years: PackageTrendRow[];
}

// 6. Package vs placement
export interface PackageVsPlacementPoint {
  year: number;
  branch: string;
  avgPackageLpa: number;
  placementPct: number;
  totalStudents: number | null;
  placedStudents: number | null;
}

export interface PackageVsPlacementData {
  points: PackageVsPlacementPoint[];
  medianAvgPackageLpa: number | null;
  medianPlacementPct: number | null;
  correlation: number | null;
}

// 7. Top recruiters
export interface RecruiterRow {
  company: string;
  students: number;
}

export interface TopRecruitersData {
  companies: RecruiterRow[];
}

// 8. Role distribution
export interface RoleRow {
  role: string;
  count: number;
  sharePct: number;
}

export interface RoleDistributionData {
  roles: RoleRow[];
  totalMentions: number;
}

// 9. Internship conversion vs placement
export interface InternshipPoint {
  year: number;
  branch: string;
  conversionRatePct: number;
  placementPct: number;
}

export interface TrendLine {
  slope: number;
  intercept: number;
  from: { x: number; y: number };
  to: { x: number; y: number };
}

export interface InternshipVsPlacementData {
  points: InternshipPoint[];
  trendLine: TrendLine | null;
  rSquared: number | null;
}

// 10. Branch × year heatmap
export interface PlacementHeatmapData {
  /** Row labels, best across-year mean first */
  branches: string[];
  /** Column labels, ascending */
  years: number[];
  /** cells[row][column]; null where the branch has no data for that year */
  cells: (number | null)[][];
}

export interface DashboardCharts {
  placementTrend: ChartResult<PlacementTrendData>;
  placedByYear: ChartResult<PlacedByYearData>;
  branchRanking: ChartResult<BranchRankingData>;
  packageSpread: ChartResult<PackageSpreadData>;
  packageTrend: ChartResult<PackageTrendData>;
  packageVsPlacement: ChartResult<PackageVsPlacementData>;
  topRecruiters: ChartResult<TopRecruitersData>;
  roleDistribution: ChartResult<RoleDistributionData>;
  internshipVsPlacement: ChartResult<InternshipVsPlacementData>;
  placementHeatmap: ChartResult<PlacementHeatmapData>;
}

export type ChartId = keyof DashboardCharts;
