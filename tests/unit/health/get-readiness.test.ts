import { describe, it, expect } from 'vitest';

import {
  determineOverallStatus,
  getReadiness,
  mapCheckResults,
} from '@/modules/health/core/usecases/get-readiness.js';

import { makeFailingHealthChecker, makeHealthChecker } from '../../fixtures/builders.js';

import type { HealthChecker } from '@/modules/health/core/ports.js';

describe('getReadiness', () => {
  const timestamp = '2024-06-01T00:00:00Z';
  const uptime = 42;

  it('is ok with no checkers', async () => {
    const result = await getReadiness({ checkers: [] }, { uptime, timestamp });

    expect(result).toEqual({ status: 'ok', timestamp, uptime, checks: [] });
  });

  it('reports every check in registration order', async () => {
    const checkers: HealthChecker[] = [
      makeHealthChecker({ name: 'placement-dataset', message: '25 records' }),
      makeHealthChecker({ name: 'report-cache', critical: false }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('ok');
    expect(result.checks.map((c) => c.name)).toEqual(['placement-dataset', 'report-cache']);
    expect(result.checks[0]?.message).toBe('25 records');
  });

  it('includes the version only when given', async () => {
    const withVersion = await getReadiness({ checkers: [], version: '2.0.0' }, { uptime, timestamp });
    const without = await getReadiness({ checkers: [] }, { uptime, timestamp });

    expect(withVersion.version).toBe('2.0.0');
    expect('version' in without).toBe(false);
  });

  it('is unhealthy when the dataset check fails', async () => {
    const checkers: HealthChecker[] = [
      makeHealthChecker({ name: 'placement-dataset', status: 'unhealthy', critical: true }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
  });

  it('turns a throwing checker into a critical failure and keeps running the rest', async () => {
    const checkers: HealthChecker[] = [
      makeFailingHealthChecker('disk unavailable'),
      makeHealthChecker({ name: 'placement-dataset' }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
    expect(result.checks).toEqual([
      { name: 'unknown', status: 'unhealthy', message: 'disk unavailable', critical: true },
      { name: 'placement-dataset', status: 'healthy' },
    ]);
  });
});

describe('mapCheckResults', () => {
  it('uses a generic message for non-Error rejections', () => {
    const checks = mapCheckResults([{ status: 'rejected', reason: 'boom' }]);

    expect(checks).toEqual([
      { name: 'unknown', status: 'unhealthy', message: 'Check failed', critical: true },
    ]);
  });
});

describe('determineOverallStatus', () => {
  it.each([
    {
      name: 'all healthy',
      checks: [{ name: 'a', status: 'healthy' as const }],
      expected: 'ok',
    },
    {
      name: 'unflagged failure counts as critical',
      checks: [{ name: 'a', status: 'unhealthy' as const }],
      expected: 'unhealthy',
    },
    {
      name: 'only non-critical failures',
      checks: [
        { name: 'a', status: 'healthy' as const, critical: true },
        { name: 'b', status: 'unhealthy' as const, critical: false },
      ],
      expected: 'degraded',
    },
    {
      name: 'critical failure wins over degraded',
      checks: [
        { name: 'a', status: 'unhealthy' as const, critical: true },
        { name: 'b', status: 'unhealthy' as const, critical: false },
      ],
      expected: 'unhealthy',
    },
  ])('$name', ({ checks, expected }) => {
    expect(determineOverallStatus(checks)).toBe(expected);
  });
});
