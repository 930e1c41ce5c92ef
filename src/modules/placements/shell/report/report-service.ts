import {
  generateReport,
  type GeneratedReport,
  type ReportLogger,
} from '../../core/usecases/generate-report.js';

import type { ReportError } from '../../core/errors.js';
import type { Hasher, ReportCache, ReportRenderer } from '../../core/ports.js';
import type { Dashboard } from '../../core/usecases/build-dashboard.js';
import type { Result } from 'neverthrow';

export interface ReportServiceDeps {
  renderer: ReportRenderer;
  hasher: Hasher;
  cache: ReportCache;
  /** Receives cache hit/miss events at debug level */
  logger?: ReportLogger;
}

export interface ReportService {
  generate(dashboard: Dashboard): Result<GeneratedReport, ReportError>;
}

export const createReportService = (deps: ReportServiceDeps): ReportService => {
  const { renderer, hasher, cache, logger } = deps;

  return {
    generate(dashboard) {
      return generateReport({ renderer, hasher, cache }, dashboard, logger);
    },
  };
};
