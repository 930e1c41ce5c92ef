import { err, ok, type Result } from 'neverthrow';

import { compareStrings } from '../numeric.js';
import { PLACEMENT_COLUMNS, type PlacementColumn } from '../types.js';

import type { PlacementParseError } from '../errors.js';
import type { PlacementDataset, PlacementRecord, RawPlacementTable } from '../types.js';

type ColumnIndex = ReadonlyMap<PlacementColumn, number>;

// Decimal notation only: no hex, binary or octal literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Numeric cell → number, or `null` for blank and unparseable cells.
 */
export const coerceNumber = (raw: string | undefined): number | null => {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

/**
 * Text cell → trimmed string, or `null` when blank.
 */
export const coerceText = (raw: string | undefined): string | null => {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  return trimmed === '' ? null : trimmed;
};

const indexColumns = (headers: string[]): Result<ColumnIndex, PlacementParseError> => {
  const positions = new Map<string, number>();
  headers.forEach((header, idx) => {
    const name = header.trim();
    if (!positions.has(name)) positions.set(name, idx);
  });

  const missing = PLACEMENT_COLUMNS.filter((column) => !positions.has(column));
  if (missing.length > 0) {
    return err({
      type: 'MissingColumns',
      message: `Placement data is missing required columns: ${missing.join(', ')}`,
      columns: [...missing],
    });
  }

  const index = new Map<PlacementColumn, number>();
  for (const column of PLACEMENT_COLUMNS) {
    index.set(column, positions.get(column) ?? -1);
  }
  return ok(index);
};

const toRecord = (
  row: string[],
  index: ColumnIndex,
  rowNumber: number
): Result<PlacementRecord, PlacementParseError> => {
  const cell = (column: PlacementColumn): string | undefined => row[index.get(column) ?? -1];
  const num = (column: PlacementColumn): number | null => coerceNumber(cell(column));
  const text = (column: PlacementColumn): string | null => coerceText(cell(column));

  const yearRaw = cell('year') ?? '';
  const year = coerceNumber(yearRaw);
  if (year === null) {
    return err({
      type: 'InvalidYear',
      message: `Row ${String(rowNumber)} has a non-numeric year '${yearRaw}'`,
      row: rowNumber,
      value: yearRaw,
    });
  }

  const record: PlacementRecord = {
    year: Math.trunc(year),
    branch: (cell('branch') ?? '').trim(),
    totalStudents: num('total_students'),
    placedStudents: num('placed_students'),
    unplacedStudents: num('unplaced_students'),
    placementPercentage: num('placement_percentage'),
    highestPackageLpa: num('highest_package_LPA'),
    medianPackageLpa: num('median_package_LPA'),
    lowestPackageLpa: num('lowest_package_LPA'),
    avgPackageLpa: num('avg_package_LPA'),
    topCompanies: [
      { name: text('top_company_1'), students: num('top_company_1_students') },
      { name: text('top_company_2'), students: num('top_company_2_students') },
      { name: text('top_company_3'), students: num('top_company_3_students') },
    ],
    topJobRoles: [text('top_job_role_1'), text('top_job_role_2'), text('top_job_role_3')],
    internshipConversionRatePercent: num('internship_conversion_rate_percent'),
  };
  return ok(record);
};

/**
 * Canonical row order: year ascending, then branch (code-point order).
 * `Array.prototype.sort` is stable, so duplicates keep their file order.
 */
export const sortPlacements = (records: readonly PlacementRecord[]): PlacementRecord[] =>
  [...records].sort((a, b) => a.year - b.year || compareStrings(a.branch, b.branch));

/**
 * Builds the dataset from a tokenized CSV.
 *
 * Structural problems (no header, missing columns, a year that is not a
 * number) fail the whole load. Any other unparseable numeric cell becomes
 * `null` and the row is kept.
 */
export const parsePlacements = (
  table: RawPlacementTable
): Result<PlacementDataset, PlacementParseError> => {
  if (table.headers.length === 0) {
    return err({ type: 'EmptyFile', message: 'Placement data has no header row' });
  }

  const indexResult = indexColumns(table.headers);
  if (indexResult.isErr()) {
    return err(indexResult.error);
  }

  const records: PlacementRecord[] = [];
  for (const [i, row] of table.rows.entries()) {
    // Header is line 1 of the file
    const recordResult = toRecord(row, indexResult.value, i + 2);
    if (recordResult.isErr()) {
      return err(recordResult.error);
    }
    records.push(recordResult.value);
  }

  return ok(sortPlacements(records));
};
