import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import { createSerializationError, type ExportError } from '../../core/errors.js';
import { PLACEMENT_COLUMNS, type PlacementColumn } from '../../core/types.js';

import type { PlacementDataset, PlacementRecord } from '../../core/types.js';

type Cell = string | number | null;

const toCells = (r: PlacementRecord): Record<PlacementColumn, Cell> => {
  const [c1, c2, c3] = r.topCompanies;
  const [role1, role2, role3] = r.topJobRoles;
  return {
    year: r.year,
    branch: r.branch,
    total_students: r.totalStudents,
    placed_students: r.placedStudents,
    unplaced_students: r.unplacedStudents,
    placement_percentage: r.placementPercentage,
    highest_package_LPA: r.highestPackageLpa,
    median_package_LPA: r.medianPackageLpa,
    lowest_package_LPA: r.lowestPackageLpa,
    avg_package_LPA: r.avgPackageLpa,
    top_company_1: c1.name,
    top_company_1_students: c1.students,
    top_company_2: c2.name,
    top_company_2_students: c2.students,
    top_company_3: c3.name,
    top_company_3_students: c3.students,
    top_job_role_1: role1,
    top_job_role_2: role2,
    top_job_role_3: role3,
    internship_conversion_rate_percent: r.internshipConversionRatePercent,
  };
};

/**
 * Writes rows back out with the same header contract the loader reads.
 * Missing values become empty cells.
 */
export const exportPlacementsCsv = (dataset: PlacementDataset): Result<string, ExportError> => {
  try {
    const csv = stringify(dataset.map(toCells), {
      header: true,
      columns: [...PLACEMENT_COLUMNS],
    });
    return ok(csv);
  } catch (error) {
    return err(createSerializationError(error));
  }
};
