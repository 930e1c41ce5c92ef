import type { FilterSelection, NumericRange, PlacementDataset } from '../types.js';

const inRange = (value: number | null, range: NumericRange): boolean =>
  value !== null && value >= range.min && value <= range.max;

/**
 * Applies the four-way conjunctive predicate.
 *
 * A row is kept iff its year and branch are selected and its average package
 * and placement percentage fall inside the (inclusive) ranges. Rows with a
 * missing package or percentage never match a range. Returns a new array,
 * possibly empty; the input is left untouched.
 */
export const filterPlacements = (
  dataset: PlacementDataset,
  selection: FilterSelection
): PlacementDataset => {
  const years = new Set(selection.years);
  const branches = new Set(selection.branches);

  return dataset.filter(
    (record) =>
      years.has(record.year) &&
      branches.has(record.branch) &&
      inRange(record.avgPackageLpa, selection.packageRange) &&
      inRange(record.placementPercentage, selection.placementPctRange)
  );
};
