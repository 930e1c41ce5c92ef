import { CHART_IDS, CHART_TITLES, type ChartId, type DashboardCharts } from '../charts/index.js';
import { compareStrings, formatCount, formatFixed, meanOf } from '../numeric.js';

import type { Dashboard } from './build-dashboard.js';
import type { FilterSelection } from '../types.js';

export const REPORT_TITLE = 'Campus Placement Analytics Report';
export const EMPTY_REPORT_MESSAGE = 'No records match the selected filters.';
export const MAX_REPORT_BARS = 10;

export interface ReportBar {
  label: string;
  value: number;
  /** Formatted value printed next to the bar */
  display: string;
}

export interface ReportSection {
  id: ChartId;
  title: string;
  insight: string;
  bars: ReportBar[];
}

/**
 * Renderer-independent description of the exported document.
 */
export interface ReportOutline {
  title: string;
  filterLines: string[];
  kpiLines: string[];
  sections: ReportSection[];
  /** Set instead of sections when the selection matches nothing */
  emptyMessage: string | null;
}

const pct = (value: number): string => `${formatFixed(value, 1)}%`;
const lpa = (value: number): string => `${formatFixed(value, 2)} LPA`;

const describeSelection = (selection: FilterSelection, recordCount: number): string[] => [
  `Years: ${selection.years.join(', ')}`,
  `Branches: ${selection.branches.join(', ')}`,
  `Average package: ${lpa(selection.packageRange.min)} to ${lpa(selection.packageRange.max)}`,
  `Placement rate: ${pct(selection.placementPctRange.min)} to ${pct(selection.placementPctRange.max)}`,
  `Records: ${formatCount(recordCount)}`,
];

type BarExtractor = (charts: DashboardCharts) => ReportBar[];

// One bar series per chart, chosen to read well as a horizontal bar list
const BAR_EXTRACTORS: Record<ChartId, BarExtractor> = {
  placementTrend: ({ placementTrend: { data } }) => {
    const latestYear = data?.points.at(-1)?.year;
    return (data?.points ?? [])
      .filter((p) => p.year === latestYear)
      .map((p) => ({
        label: `${p.branch} ${String(p.year)}`,
        value: p.placementPct,
        display: pct(p.placementPct),
      }));
  },
  placedByYear: ({ placedByYear: { data } }) =>
    (data?.years ?? []).map((y) => ({
      label: String(y.year),
      value: y.placed,
      display: formatCount(y.placed),
    })),
  branchRanking: ({ branchRanking: { data } }) =>
    [...(data?.branches ?? [])].reverse().map((b) => ({
      label: b.branch,
      value: b.placementPct,
      display: pct(b.placementPct),
    })),
  packageSpread: ({ packageSpread: { data } }) => {
    const byBranch = new Map<string, number[]>();
    for (const entry of data?.entries ?? []) {
      if (entry.kind !== 'Avg') continue;
      byBranch.set(entry.branch, [...(byBranch.get(entry.branch) ?? []), entry.packageLpa]);
    }
    return [...byBranch.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([branch, values]) => {
        const mean = meanOf(values) ?? 0;
        return { label: branch, value: mean, display: lpa(mean) };
      });
  },
  packageTrend: ({ packageTrend: { data } }) =>
    (data?.years ?? []).flatMap((y) =>
      y.average === null ? [] : [{ label: String(y.year), value: y.average, display: lpa(y.average) }]
    ),
  packageVsPlacement: ({ packageVsPlacement: { data } }) =>
    [...(data?.points ?? [])]
      .sort((a, b) => b.avgPackageLpa - a.avgPackageLpa)
      .map((p) => ({
        label: `${p.branch} ${String(p.year)}`,
        value: p.avgPackageLpa,
        display: `${lpa(p.avgPackageLpa)} / ${pct(p.placementPct)}`,
      })),
  topRecruiters: ({ topRecruiters: { data } }) =>
    (data?.companies ?? []).map((c) => ({
      label: c.company,
      value: c.students,
      display: formatCount(c.students),
    })),
  roleDistribution: ({ roleDistribution: { data } }) =>
    (data?.roles ?? []).map((r) => ({
      label: r.role,
      value: r.count,
      display: `${String(r.count)} (${pct(r.sharePct)})`,
    })),
  internshipVsPlacement: ({ internshipVsPlacement: { data } }) =>
    [...(data?.points ?? [])]
      .sort((a, b) => b.conversionRatePct - a.conversionRatePct)
      .map((p) => ({
        label: `${p.branch} ${String(p.year)}`,
        value: p.conversionRatePct,
        display: `${pct(p.conversionRatePct)} / ${pct(p.placementPct)}`,
      })),
  placementHeatmap: ({ placementHeatmap: { data } }) => {
    if (data === null) return [];
    const lastYear = data.years.at(-1);
    return data.branches.flatMap((branch, row) => {
      const value = data.cells[row]?.at(-1);
      if (value === null || value === undefined || lastYear === undefined) return [];
      return [{ label: `${branch} ${String(lastYear)}`, value, display: pct(value) }];
    });
  },
};

/**
 * Flattens a dashboard into the sections of the exported report.
 */
export const buildReportOutline = (dashboard: Dashboard): ReportOutline => {
  const base = {
    title: REPORT_TITLE,
    filterLines: describeSelection(dashboard.selection, dashboard.recordCount),
    kpiLines: dashboard.kpis.map((kpi) =>
      kpi.delta === null ? `${kpi.label}: ${kpi.value}` : `${kpi.label}: ${kpi.value} (${kpi.delta})`
    ),
  };

  if (dashboard.isEmpty) {
    return { ...base, sections: [], emptyMessage: EMPTY_REPORT_MESSAGE };
  }

  const sections = CHART_IDS.map((id) => ({
    id,
    title: CHART_TITLES[id],
    insight: dashboard.charts[id].insight,
    bars: BAR_EXTRACTORS[id](dashboard.charts).slice(0, MAX_REPORT_BARS),
  }));

  return { ...base, sections, emptyMessage: null };
};
