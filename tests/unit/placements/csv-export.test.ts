import { describe, expect, it } from 'vitest';

import { PLACEMENT_COLUMNS } from '@/modules/placements/core/types.js';
import { parsePlacements } from '@/modules/placements/core/usecases/parse-placements.js';
import { exportPlacementsCsv } from '@/modules/placements/shell/export/csv-export.js';
import { tokenizeCsv } from '@/modules/placements/shell/repo/csv-repo.js';

import { makePlacementRecord } from '../../fixtures/builders.js';

describe('exportPlacementsCsv', () => {
  it('writes the header contract and one line per record', () => {
    const csv = exportPlacementsCsv([
      makePlacementRecord({
        year: 2024,
        branch: 'Civil',
        topCompanies: [
          { name: 'Acme, Ltd', students: 4 },
          { name: null, students: null },
          { name: null, students: null },
        ],
        topJobRoles: ['Site Engineer', null, null],
        internshipConversionRatePercent: null,
      }),
    ])._unsafeUnwrap();

    const [header, row, trailing] = csv.split('\n');
    expect(header).toBe(PLACEMENT_COLUMNS.join(','));
    expect(row).toBe(
      '2024,Civil,100,80,20,80,12,6,3,6.5,"Acme, Ltd",4,,,,,Site Engineer,,,'
    );
    expect(trailing).toBe('');
  });

  it('writes only the header for an empty selection', () => {
    expect(exportPlacementsCsv([])._unsafeUnwrap()).toBe(`${PLACEMENT_COLUMNS.join(',')}\n`);
  });

  it('reads back to the same records', () => {
    const records = [
      makePlacementRecord({ year: 2022, branch: 'IT', avgPackageLpa: null }),
      makePlacementRecord({ year: 2023, branch: 'IT', topJobRoles: ['Developer', 'Tester', null] }),
    ];

    const csv = exportPlacementsCsv(records)._unsafeUnwrap();

    expect(parsePlacements(tokenizeCsv(csv))._unsafeUnwrap()).toEqual(records);
  });
});
