import type { PlacementRepoError, ReportError } from './errors.js';
import type { ReportOutline } from './usecases/build-report-outline.js';
import type { PlacementDataset } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Source of the (immutable) placement dataset.
 */
export interface PlacementRepo {
  /**
   * Load the dataset. Implementations memoize the first successful load.
   */
  load(): Promise<Result<PlacementDataset, PlacementRepoError>>;
}

/**
 * Turns a report outline into document bytes.
 * Identical outlines must produce identical bytes.
 */
export interface ReportRenderer {
  readonly contentType: string;
  render(outline: ReportOutline): Result<Uint8Array, ReportError>;
}

export interface Hasher {
  sha256(data: string): string;
}

/**
 * Memo store for rendered reports, keyed by selection hash.
 */
export interface ReportCache {
  get(key: string): Uint8Array | undefined;
  set(key: string, value: Uint8Array): void;
}
