import { describe, expect, it } from 'vitest';

import { classifyRSquared } from '@/modules/placements/core/charts/grouping.js';
import { buildInternshipVsPlacement } from '@/modules/placements/core/charts/internship-vs-placement.js';

import { makePlacementRecord, makeSampleDataset } from '../../../fixtures/builders.js';

describe('buildInternshipVsPlacement', () => {
  it('fits a least-squares line through the points', () => {
    const result = buildInternshipVsPlacement(makeSampleDataset());

    expect(result.data?.points).toHaveLength(4);
    expect(result.data?.trendLine?.slope).toBeCloseTo(0.7, 10);
    expect(result.data?.trendLine?.intercept).toBeCloseTo(40, 10);
    expect(result.data?.trendLine?.from.x).toBe(30);
    expect(result.data?.trendLine?.from.y).toBeCloseTo(61, 10);
    expect(result.data?.trendLine?.to.x).toBe(70);
    expect(result.data?.trendLine?.to.y).toBeCloseTo(89, 10);
    expect(result.data?.rSquared).toBeCloseTo(0.98, 10);
    expect(result.insight).toBe(
      'Internship conversion rate shows a strong positive correlation with placement percentage (R² = 0.98).'
    );
  });

  it('skips rows without a conversion rate', () => {
    const result = buildInternshipVsPlacement([
      makePlacementRecord({ internshipConversionRatePercent: null }),
      makePlacementRecord({ internshipConversionRatePercent: 40 }),
    ]);

    expect(result.data?.points).toHaveLength(1);
    expect(result.data?.trendLine).toBeNull();
    expect(result.data?.rSquared).toBeNull();
    expect(result.insight).toBe('');
  });

  it('draws the line but gives no insight below four rows', () => {
    const result = buildInternshipVsPlacement([
      makePlacementRecord({ internshipConversionRatePercent: 30, placementPercentage: 60 }),
      makePlacementRecord({ internshipConversionRatePercent: 50, placementPercentage: 80 }),
      makePlacementRecord({ internshipConversionRatePercent: 70, placementPercentage: 90 }),
    ]);

    expect(result.data?.trendLine?.slope).toBeCloseTo(0.75, 10);
    expect(result.data?.rSquared).toBeCloseTo(0.9643, 4);
    expect(result.insight).toBe('');
  });

  it('is empty for an empty dataset', () => {
    expect(buildInternshipVsPlacement([])).toEqual({ data: null, insight: '' });
  });
});

describe('classifyRSquared', () => {
  it.each([
    { rSquared: 0.61, expected: 'strong' },
    { rSquared: 0.6, expected: 'moderate' },
    { rSquared: 0.31, expected: 'moderate' },
    { rSquared: 0.3, expected: 'weak' },
  ])('classifies R² = $rSquared as $expected', ({ rSquared, expected }) => {
    expect(classifyRSquared(rSquared)).toBe(expected);
  });
});
