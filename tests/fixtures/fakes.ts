/**
 * Test fakes and mocks
 */

import { err, ok, type Result } from 'neverthrow';

import type { PlacementRepoError, ReportError } from '@/modules/placements/core/errors.js';
import type { PlacementRepo, ReportCache, ReportRenderer } from '@/modules/placements/core/ports.js';
import type { PlacementDataset } from '@/modules/placements/core/types.js';
import type { ReportOutline } from '@/modules/placements/core/usecases/build-report-outline.js';

/**
 * In-memory placement repository. Counts loads so memoization can be asserted.
 */
export const makeFakePlacementRepo = (
  dataset: PlacementDataset
): PlacementRepo & { loadCount: () => number } => {
  let loads = 0;
  return {
    async load() {
      loads++;
      return ok(dataset);
    },
    loadCount: () => loads,
  };
};

/**
 * Repository whose load always fails with the given error.
 */
export const makeFailingPlacementRepo = (error: PlacementRepoError): PlacementRepo => ({
  async load() {
    return err(error);
  },
});

/**
 * Renderer that encodes the outline title and section count as bytes and
 * records every outline it renders.
 */
export const makeFakeReportRenderer = (
  options: { fail?: ReportError } = {}
): ReportRenderer & { rendered: ReportOutline[] } => {
  const rendered: ReportOutline[] = [];
  return {
    contentType: 'application/pdf',
    rendered,
    render(outline): Result<Uint8Array, ReportError> {
      rendered.push(outline);
      if (options.fail !== undefined) {
        return err(options.fail);
      }
      return ok(
        new TextEncoder().encode(`${outline.title}|${String(outline.sections.length)}`)
      );
    },
  };
};

/**
 * Unbounded map-backed report cache.
 */
export const makeMemoryReportCache = (): ReportCache & { size: () => number } => {
  const store = new Map<string, Uint8Array>();
  return {
    get: (key) => store.get(key),
    set: (key, value) => {
      store.set(key, value);
    },
    size: () => store.size,
  };
};
