import fastifyLib, { type FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';

import { makeHealthRoutes } from '@/modules/health/index.js';

import { makeHealthChecker } from '../../fixtures/builders.js';

import type { MakeHealthRoutesDeps } from '@/modules/health/index.js';

const makeClock = (startMs: number): { now: () => number; advance: (ms: number) => void } => {
  let current = startMs;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
};

describe('makeHealthRoutes', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  const start = async (deps: MakeHealthRoutesDeps): Promise<FastifyInstance> => {
    app = fastifyLib({ logger: false });
    await app.register(makeHealthRoutes(deps));
    await app.ready();
    return app;
  };

  it('reports uptime and timestamp from the injected clock', async () => {
    const clock = makeClock(Date.UTC(2024, 5, 1, 12, 0, 0));
    const server = await start({
      checkers: [makeHealthChecker({ name: 'placement-dataset', message: '25 records' })],
      version: '0.1.0',
      now: clock.now,
    });

    clock.advance(90_500);
    const response = await server.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ok',
      timestamp: '2024-06-01T12:01:30.500Z',
      version: '0.1.0',
      uptime: 90,
      checks: [{ name: 'placement-dataset', status: 'healthy', message: '25 records' }],
    });
  });

  it('stays ready when only optional checks fail', async () => {
    const server = await start({
      checkers: [makeHealthChecker({ name: 'report-cache', status: 'unhealthy', critical: false })],
    });

    const response = await server.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('degraded');
  });

  it('serves liveness without running checkers', async () => {
    let calls = 0;
    const server = await start({
      checkers: [
        async () => {
          calls++;
          return { name: 'placement-dataset', status: 'healthy' };
        },
      ],
    });

    const response = await server.inject({ method: 'GET', url: '/health/live' });

    expect(response.json()).toEqual({ status: 'ok' });
    expect(calls).toBe(0);
  });
});
