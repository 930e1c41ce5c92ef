import { computeMetrics, formatKpis } from './compute-metrics.js';
import { filterPlacements } from './filter-placements.js';
import { countActiveFilters, getFilterOptions, resolveSelection } from './resolve-selection.js';
import { buildAllCharts, type DashboardCharts } from '../charts/index.js';

import type {
  DerivedMetrics,
  FilterSelection,
  FilterSelectionInput,
  KpiCard,
  PlacementDataset,
} from '../types.js';

/**
 * Everything a client needs to draw one state of the dashboard.
 */
export interface Dashboard {
  selection: FilterSelection;
  activeFilterCount: number;
  recordCount: number;
  isEmpty: boolean;
  metrics: DerivedMetrics;
  kpis: KpiCard[];
  charts: DashboardCharts;
}

/**
 * Resolve → filter → metrics + charts.
 *
 * An empty filter result is a valid dashboard: zero metrics and every chart
 * `{ data: null, insight: '' }`.
 */
export const buildDashboard = (
  dataset: PlacementDataset,
  input: FilterSelectionInput
): Dashboard => {
  const options = getFilterOptions(dataset);
  const selection = resolveSelection(options, input);
  const filtered = filterPlacements(dataset, selection);
  const metrics = computeMetrics(filtered);

  return {
    selection,
    activeFilterCount: countActiveFilters(options, selection),
    recordCount: filtered.length,
    isEmpty: filtered.length === 0,
    metrics,
    kpis: formatKpis(metrics),
    charts: buildAllCharts(filtered),
  };
};
