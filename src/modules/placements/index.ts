// Repository
export {
  createPlacementRepo,
  tokenizeCsv,
  type PlacementRepoOptions,
} from './shell/repo/csv-repo.js';
export type { PlacementRepo, ReportRenderer, ReportCache, Hasher } from './core/ports.js';

// Use cases
export { parsePlacements, sortPlacements } from './core/usecases/parse-placements.js';
export { filterPlacements } from './core/usecases/filter-placements.js';
export {
  compareBranches,
  countActiveFilters,
  getFilterOptions,
  resolveSelection,
} from './core/usecases/resolve-selection.js';
export { computeMetrics, formatKpis } from './core/usecases/compute-metrics.js';
export { buildDashboard, type Dashboard } from './core/usecases/build-dashboard.js';
export {
  buildReportOutline,
  type ReportOutline,
  type ReportSection,
} from './core/usecases/build-report-outline.js';
export { generateReport, type GeneratedReport, type ReportLogger } from './core/usecases/generate-report.js';

// Charts
export { buildAllCharts, CHART_IDS, CHART_TITLES } from './core/charts/index.js';
export type { ChartId, ChartResult, DashboardCharts } from './core/charts/index.js';

// Shell adapters
export { createPdfReportRenderer, PDF_CONTENT_TYPE } from './shell/report/pdf-renderer.js';
export { createReportService, type ReportService } from './shell/report/report-service.js';
export { createReportCache, type ReportCacheOptions } from './shell/cache/report-cache.js';
export { cryptoHasher } from './shell/crypto/hasher.js';
export { exportPlacementsCsv } from './shell/export/csv-export.js';

// REST
export { makePlacementRoutes, type MakePlacementRoutesDeps } from './shell/rest/routes.js';

// Types
export type {
  PlacementRecord,
  PlacementDataset,
  FilterSelection,
  FilterSelectionInput,
  FilterOptions,
  DerivedMetrics,
  KpiCard,
} from './core/types.js';

// Errors
export {
  getHttpStatusForError,
  type PlacementError,
  type PlacementRepoError,
} from './core/errors.js';
