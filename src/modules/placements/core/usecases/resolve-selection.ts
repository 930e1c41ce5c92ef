import { compareStrings, maxOf, minOf } from '../numeric.js';
import {
  FULL_PLACEMENT_PCT_RANGE,
  KNOWN_BRANCHES,
  type FilterOptions,
  type FilterSelection,
  type FilterSelectionInput,
  type NumericRange,
  type PlacementDataset,
} from '../types.js';

const knownBranchRank = new Map<string, number>(KNOWN_BRANCHES.map((b, i) => [b, i]));

/**
 * Known branches first in their fixed order, then anything else alphabetically.
 */
export const compareBranches = (a: string, b: string): number => {
  const rankA = knownBranchRank.get(a) ?? KNOWN_BRANCHES.length;
  const rankB = knownBranchRank.get(b) ?? KNOWN_BRANCHES.length;
  return rankA - rankB || compareStrings(a, b);
};

/**
 * Full domain of every filter dimension for a dataset.
 */
export const getFilterOptions = (dataset: PlacementDataset): FilterOptions => {
  const years = [...new Set(dataset.map((r) => r.year))].sort((a, b) => b - a);
  const branches = [...new Set(dataset.map((r) => r.branch))].sort(compareBranches);
  const packages = dataset.map((r) => r.avgPackageLpa);

  return {
    years,
    branches,
    packageRange: { min: minOf(packages) ?? 0, max: maxOf(packages) ?? 0 },
    placementPctRange: { ...FULL_PLACEMENT_PCT_RANGE },
  };
};

/**
 * Fills in what the client left out.
 *
 * Missing or empty year/branch lists mean "everything", never "nothing".
 * Missing ranges default to the full domain.
 */
export const resolveSelection = (
  options: FilterOptions,
  input: FilterSelectionInput
): FilterSelection => ({
  years: input.years !== undefined && input.years.length > 0 ? [...input.years] : options.years,
  branches:
    input.branches !== undefined && input.branches.length > 0
      ? [...input.branches]
      : options.branches,
  packageRange: input.packageRange ?? options.packageRange,
  placementPctRange: input.placementPctRange ?? options.placementPctRange,
});

const sameMembers = <T>(a: readonly T[], b: readonly T[]): boolean => {
  const setA = new Set(a);
  const setB = new Set(b);
  return setA.size === setB.size && [...setA].every((v) => setB.has(v));
};

const sameRange = (a: NumericRange, b: NumericRange): boolean =>
  a.min === b.min && a.max === b.max;

/**
 * Number of dimensions (0-4) narrowed from the full domain.
 */
export const countActiveFilters = (options: FilterOptions, selection: FilterSelection): number =>
  [
    !sameMembers(selection.years, options.years),
    !sameMembers(selection.branches, options.branches),
    !sameRange(selection.packageRange, options.packageRange),
    !sameRange(selection.placementPctRange, options.placementPctRange),
  ].filter(Boolean).length;
