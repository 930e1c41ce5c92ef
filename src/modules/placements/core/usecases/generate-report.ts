/**
 * Generate Report Use Case
 *
 * Renders the dashboard for a selection into a document, reusing earlier
 * renders of the same selection.
 */

import { ok, type Result } from 'neverthrow';

import { buildReportOutline } from './build-report-outline.js';
import { compareStrings } from '../numeric.js';

import type { Dashboard } from './build-dashboard.js';
import type { ReportError } from '../errors.js';
import type { Hasher, ReportCache, ReportRenderer } from '../ports.js';
import type { FilterSelection } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateReportDeps {
  renderer: ReportRenderer;
  hasher: Hasher;
  cache: ReportCache;
}

export interface ReportLogger {
  debug(context: Record<string, unknown>, message: string): void;
}

export interface GeneratedReport {
  /** SHA-256 of the canonical selection */
  key: string;
  contentType: string;
  bytes: Uint8Array;
  cached: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Order-insensitive serialization of a selection, so `[2023, 2024]` and
 * `[2024, 2023]` share one cache entry.
 */
export const canonicalSelection = (selection: FilterSelection): string =>
  JSON.stringify({
    years: [...new Set(selection.years)].sort((a, b) => a - b),
    branches: [...new Set(selection.branches)].sort(compareStrings),
    packageRange: { min: selection.packageRange.min, max: selection.packageRange.max },
    placementPctRange: {
      min: selection.placementPctRange.min,
      max: selection.placementPctRange.max,
    },
  });

export const selectionKey = (hasher: Hasher, selection: FilterSelection): string =>
  hasher.sha256(canonicalSelection(selection));

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Returns the rendered report for the dashboard's selection.
 *
 * The dataset is immutable for the lifetime of the process, so the resolved
 * selection alone identifies the document.
 */
export const generateReport = (
  deps: GenerateReportDeps,
  dashboard: Dashboard,
  logger?: ReportLogger
): Result<GeneratedReport, ReportError> => {
  const { renderer, hasher, cache } = deps;
  const key = selectionKey(hasher, dashboard.selection);

  const cachedBytes = cache.get(key);
  if (cachedBytes !== undefined) {
    logger?.debug({ key }, 'Report cache hit');
    return ok({ key, contentType: renderer.contentType, bytes: cachedBytes, cached: true });
  }

  logger?.debug({ key }, 'Report cache miss');
  return renderer.render(buildReportOutline(dashboard)).map((bytes) => {
    cache.set(key, bytes);
    return { key, contentType: renderer.contentType, bytes, cached: false };
  });
};
