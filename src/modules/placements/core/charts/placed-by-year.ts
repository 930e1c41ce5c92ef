import { emptyChart, groupRows } from './grouping.js';
import { formatCount, formatFixed, ratioPct, roundHalfUp, sumOf } from '../numeric.js';

import type { ChartBuilder, PlacedByYearData, PlacedByYearRow } from './types.js';

/**
 * Stacked placed/unplaced totals per year.
 */
export const buildPlacedByYear: ChartBuilder<PlacedByYearData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const years: PlacedByYearRow[] = [...groupRows(dataset, (r) => r.year).entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, rows]) => {
      const placed = sumOf(rows.map((r) => r.placedStudents));
      const total = sumOf(rows.map((r) => r.totalStudents));
      return {
        year,
        placed,
        unplaced: sumOf(rows.map((r) => r.unplacedStudents)),
        total,
        placedPct: roundHalfUp(ratioPct(placed, total), 1),
      };
    });

  const first = years[0];
  const last = years.at(-1);
  if (years.length < 2 || first === undefined || last === undefined) {
    return { data: { years }, insight: '' };
  }

  // Positional: first and last years present, not necessarily adjacent
  const growth = ((last.placed - first.placed) / Math.max(first.placed, 1)) * 100;

  return {
    data: { years },
    insight:
      `Total placements grew ${formatFixed(growth, 0)}% from ${String(first.year)} to ` +
      `${String(last.year)}, rising from ${formatCount(first.placed)} to ` +
      `${formatCount(last.placed)} students.`,
  };
};
