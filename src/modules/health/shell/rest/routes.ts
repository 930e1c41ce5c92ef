/**
 * Health routes
 *
 * - GET /health/live: the process is up
 * - GET /health/ready: the placement dataset (and any extra checker) is usable
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';

import type { HealthChecker } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps {
  checkers?: HealthChecker[];
  version?: string;
  /** Epoch milliseconds; injected by tests */
  now?: () => number;
}

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const { checkers = [], version, now = Date.now } = deps;
  const startedAt = now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => reply.status(200).send({ status: 'ok' })
    );

    // 503 only for critical failures; a degraded service still takes traffic
    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema },
        },
      },
      async (_request, reply) => {
        const current = now();
        const readiness = await getReadiness(
          { checkers, version },
          {
            uptime: Math.floor((current - startedAt) / 1000),
            timestamp: new Date(current).toISOString(),
          }
        );

        return reply.status(readiness.status === 'unhealthy' ? 503 : 200).send(readiness);
      }
    );
  };
};
