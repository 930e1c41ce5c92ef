import {
  MIN_ROWS_FOR_CORRELATION,
  classifyRSquared,
  correlationDirection,
  emptyChart,
} from './grouping.js';
import { completePairs, formatFixed, linearFit, maxOf, minOf, pearson } from '../numeric.js';

import type { ChartBuilder, InternshipPoint, InternshipVsPlacementData, TrendLine } from './types.js';

/**
 * Internship conversion rate against placement %, with a least-squares line.
 */
export const buildInternshipVsPlacement: ChartBuilder<InternshipVsPlacementData> = (dataset) => {
  if (dataset.length === 0) return emptyChart();

  const points: InternshipPoint[] = [];
  for (const row of dataset) {
    if (row.internshipConversionRatePercent === null || row.placementPercentage === null) continue;
    points.push({
      year: row.year,
      branch: row.branch,
      conversionRatePct: row.internshipConversionRatePercent,
      placementPct: row.placementPercentage,
    });
  }

  const pairs = completePairs(
    points,
    (p) => p.conversionRatePct,
    (p) => p.placementPct
  );
  const fit = linearFit(pairs);
  const r = pearson(pairs);
  const rSquared = r === null ? null : r * r;

  let trendLine: TrendLine | null = null;
  const xs = pairs.map((p) => p.x);
  const fromX = minOf(xs);
  const toX = maxOf(xs);
  if (fit !== null && fromX !== null && toX !== null) {
    trendLine = {
      ...fit,
      from: { x: fromX, y: fit.slope * fromX + fit.intercept },
      to: { x: toX, y: fit.slope * toX + fit.intercept },
    };
  }

  const data: InternshipVsPlacementData = { points, trendLine, rSquared };

  if (dataset.length < MIN_ROWS_FOR_CORRELATION || r === null || rSquared === null) {
    return { data, insight: '' };
  }

  return {
    data,
    insight:
      `Internship conversion rate shows a ${classifyRSquared(rSquared)} ${correlationDirection(r)} ` +
      `correlation with placement percentage (R² = ${formatFixed(rSquared, 2)}).`,
  };
};
