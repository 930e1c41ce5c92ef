/**
 * Placement dataset health checker
 *
 * Loads the dataset through the repository. The repository memoizes a
 * successful load, so after startup this is a cache lookup.
 */

import type { PlacementRepo } from '../../../placements/index.js';
import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface DatasetHealthCheckerOptions {
  /** Name to identify the dataset in health check results */
  name?: string;
}

export const makeDatasetHealthChecker = (
  repo: PlacementRepo,
  options: DatasetHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'placement-dataset' } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    const result = await repo.load();
    const latencyMs = Date.now() - startTime;

    if (result.isErr()) {
      return {
        name,
        status: 'unhealthy',
        message: result.error.message,
        latencyMs,
        critical: true,
      };
    }

    return {
      name,
      status: 'healthy',
      message: `${String(result.value.length)} records`,
      latencyMs,
      critical: true,
    };
  };
};
