/**
 * Application composition root
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import {
  makeDatasetHealthChecker,
  makeHealthRoutes,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  createPdfReportRenderer,
  createReportCache,
  createReportService,
  cryptoHasher,
  makePlacementRoutes,
  type PlacementRepo,
  type ReportService,
} from '../modules/placements/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  placementRepo: PlacementRepo;
  config: AppConfig;
  /** Defaults to the PDF renderer with an LRU cache sized from config */
  reportService?: ReportService;
  /** Extra checkers; the placement dataset checker is always registered */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.placementRepo === undefined || deps.config === undefined) {
    throw new Error('Missing required dependencies: placementRepo, config');
  }

  const { placementRepo, config } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // Register health routes
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [makeDatasetHealthChecker(placementRepo), ...(deps.healthCheckers ?? [])],
    })
  );

  // Setup Placements Module
  const reportService =
    deps.reportService ??
    createReportService({
      renderer: createPdfReportRenderer({ hasher: cryptoHasher }),
      hasher: cryptoHasher,
      cache: createReportCache({
        max: config.report.cacheMax,
        ttlMs: config.report.cacheTtlMs,
      }),
      logger: app.log.child({ component: 'ReportService' }),
    });

  await app.register(makePlacementRoutes({ placementRepo, reportService }));

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
