import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Branches in the order dashboards list them.
 * Any other branch string is accepted and listed after these.
 */
export const KNOWN_BRANCHES = [
  'Computer Science',
  'IT',
  'Electronics',
  'Mechanical',
  'Civil',
] as const;

/**
 * CSV header contract. Column order in the file is irrelevant.
 */
export const PLACEMENT_COLUMNS = [
  'year',
  'branch',
  'total_students',
  'placed_students',
  'unplaced_students',
  'placement_percentage',
  'highest_package_LPA',
  'median_package_LPA',
  'lowest_package_LPA',
  'avg_package_LPA',
  'top_company_1',
  'top_company_1_students',
  'top_company_2',
  'top_company_2_students',
  'top_company_3',
  'top_company_3_students',
  'top_job_role_1',
  'top_job_role_2',
  'top_job_role_3',
  'internship_conversion_rate_percent',
] as const;

export type PlacementColumn = (typeof PLACEMENT_COLUMNS)[number];

export interface CompanySlot {
  name: string | null;
  students: number | null;
}

/**
 * One row per (year, branch). Numeric cells that were blank or unparseable
 * in the source are `null`; nothing here is reconciled with anything else.
 */
export interface PlacementRecord {
  year: number;
  branch: string;
  totalStudents: number | null;
  placedStudents: number | null;
  unplacedStudents: number | null;
  placementPercentage: number | null;
  highestPackageLpa: number | null;
  medianPackageLpa: number | null;
  lowestPackageLpa: number | null;
  avgPackageLpa: number | null;
  topCompanies: readonly [CompanySlot, CompanySlot, CompanySlot];
  topJobRoles: readonly [string | null, string | null, string | null];
  internshipConversionRatePercent: number | null;
}

/** Sorted by (year, branch); never mutated after load. */
export type PlacementDataset = readonly PlacementRecord[];

/**
 * Tokenized CSV: header row plus data rows, all raw strings.
 */
export interface RawPlacementTable {
  headers: string[];
  rows: string[][];
}

// ─────────────────────────────────────────────────────────────────────────────
// Filters
// ─────────────────────────────────────────────────────────────────────────────

export const NumericRangeSchema = Type.Object(
  {
    min: Type.Number(),
    max: Type.Number(),
  },
  { additionalProperties: false }
);

export type NumericRange = Static<typeof NumericRangeSchema>;

/**
 * Client-supplied selection. Every field is optional; see `resolveSelection`.
 */
export const FilterSelectionInputSchema = Type.Object(
  {
    years: Type.Optional(Type.Array(Type.Integer(), { maxItems: 200 })),
    branches: Type.Optional(Type.Array(Type.String({ maxLength: 200 }), { maxItems: 200 })),
    packageRange: Type.Optional(NumericRangeSchema),
    placementPctRange: Type.Optional(NumericRangeSchema),
  },
  { additionalProperties: false }
);

export type FilterSelectionInput = Static<typeof FilterSelectionInputSchema>;

/**
 * Fully resolved selection; what the filter engine consumes.
 */
export interface FilterSelection {
  years: number[];
  branches: string[];
  packageRange: NumericRange;
  placementPctRange: NumericRange;
}

/**
 * The full domain a client can pick from.
 */
export interface FilterOptions {
  years: number[];
  branches: string[];
  packageRange: NumericRange;
  placementPctRange: NumericRange;
}

export const FULL_PLACEMENT_PCT_RANGE: NumericRange = { min: 0, max: 100 };

// ─────────────────────────────────────────────────────────────────────────────
// Metrics
// ─────────────────────────────────────────────────────────────────────────────

export interface DerivedMetrics {
  totalPlaced: number;
  totalStudents: number;
  overallPlacementPct: number;
  highestPackage: number;
  highestPackageBranch: string;
  weightedAvgPackage: number;
  /** % change in placed count between the two latest years present */
  yoyPlacedChange: number | null;
  /** % change in placed-weighted average package between the two latest years present */
  yoyAvgPackageChange: number | null;
  /** Percentage-point change in placement rate between the two latest years present */
  placementPctDelta: number | null;
}

export interface KpiCard {
  label: string;
  value: string;
  delta: string | null;
}
