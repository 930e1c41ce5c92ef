/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { parseArgs } from 'node:util';

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createChildLogger, createLogger, prettyTransport } from './infra/logger/index.js';
import { createPlacementRepo } from './modules/placements/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'] ?? '0.1.0';

/**
 * `--data <path>` overrides PLACEMENT_DATA_PATH.
 */
const readDataPathFlag = (argv: string[]): string | undefined => {
  const { values } = parseArgs({
    args: argv,
    options: { data: { type: 'string' } },
    strict: false,
    allowPositionals: true,
  });
  return typeof values.data === 'string' ? values.data : undefined;
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'placement-analytics-server',
    pretty: config.logger.pretty,
  });

  const dataPath = readDataPathFlag(process.argv.slice(2)) ?? config.placements.dataPath;
  logger.info({ config: { server: config.server }, dataPath }, 'Starting API server');

  const placementRepo = createPlacementRepo({
    filePath: dataPath,
    logger: createChildLogger(logger, { component: 'PlacementRepo' }),
  });

  // Without a dataset there is nothing to serve
  const loaded = await placementRepo.load();
  if (loaded.isErr()) {
    logger.fatal({ err: loaded.error }, 'Placement data could not be loaded');
    process.exit(1);
  }

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      placementRepo,
      config,
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
