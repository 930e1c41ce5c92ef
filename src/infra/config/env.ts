/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_PLACEMENT_DATA_PATH = 'data/placement_data.csv';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Placement data
  PLACEMENT_DATA_PATH: Type.String({ minLength: 1 }),

  // Report memoization (TTL 0 keeps entries until evicted)
  REPORT_CACHE_MAX: Type.Integer({ minimum: 1, default: 32 }),
  REPORT_CACHE_TTL_MS: Type.Integer({ minimum: 0, default: 3_600_000 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    PLACEMENT_DATA_PATH: env['PLACEMENT_DATA_PATH'] ?? DEFAULT_PLACEMENT_DATA_PATH,
    REPORT_CACHE_MAX: parseInteger(env['REPORT_CACHE_MAX'], 32),
    REPORT_CACHE_TTL_MS: parseInteger(env['REPORT_CACHE_TTL_MS'], 3_600_000),
    ...(env['ALLOWED_ORIGINS'] !== undefined && { ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'] }),
    ...(env['CLIENT_BASE_URL'] !== undefined && { CLIENT_BASE_URL: env['CLIENT_BASE_URL'] }),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  placements: {
    dataPath: env.PLACEMENT_DATA_PATH,
  },
  report: {
    cacheMax: env.REPORT_CACHE_MAX,
    cacheTtlMs: env.REPORT_CACHE_TTL_MS,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
