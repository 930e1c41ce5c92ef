/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { createConfig, parseEnv } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env).toEqual({
        NODE_ENV: 'development',
        PORT: 3000,
        HOST: '0.0.0.0',
        LOG_LEVEL: 'info',
        PLACEMENT_DATA_PATH: 'data/placement_data.csv',
        REPORT_CACHE_MAX: 32,
        REPORT_CACHE_TTL_MS: 3_600_000,
      });
    });

    it('parses numeric settings', () => {
      const env = parseEnv({ PORT: '8080', REPORT_CACHE_MAX: '4', REPORT_CACHE_TTL_MS: '0' });

      expect(env.PORT).toBe(8080);
      expect(env.REPORT_CACHE_MAX).toBe(4);
      expect(env.REPORT_CACHE_TTL_MS).toBe(0);
    });

    it('takes the data path from the environment', () => {
      expect(parseEnv({ PLACEMENT_DATA_PATH: '/srv/data/placements.csv' }).PLACEMENT_DATA_PATH).toBe(
        '/srv/data/placements.csv'
      );
    });

    it('keeps optional CORS settings only when set', () => {
      const env = parseEnv({ ALLOWED_ORIGINS: 'http://localhost:5173' });

      expect(env.ALLOWED_ORIGINS).toBe('http://localhost:5173');
      expect('CLIENT_BASE_URL' in env).toBe(false);
    });

    it.each([
      { name: 'unknown NODE_ENV', env: { NODE_ENV: 'staging' } },
      { name: 'unknown LOG_LEVEL', env: { LOG_LEVEL: 'verbose' } },
      { name: 'non-numeric PORT', env: { PORT: 'http' } },
      { name: 'PORT out of range', env: { PORT: '70000' } },
      { name: 'empty cache size', env: { REPORT_CACHE_MAX: '0' } },
      { name: 'empty data path', env: { PLACEMENT_DATA_PATH: '' } },
    ])('rejects $name', ({ env }) => {
      expect(() => parseEnv(env)).toThrow(/Invalid environment configuration/);
    });
  });

  describe('createConfig', () => {
    it('groups settings by concern', () => {
      const config = createConfig(
        parseEnv({ NODE_ENV: 'production', LOG_LEVEL: 'warn', REPORT_CACHE_MAX: '8' })
      );

      expect(config.server).toEqual({
        port: 3000,
        host: '0.0.0.0',
        isDevelopment: false,
        isProduction: true,
        isTest: false,
      });
      expect(config.logger).toEqual({ level: 'warn', pretty: false });
      expect(config.placements.dataPath).toBe('data/placement_data.csv');
      expect(config.report).toEqual({ cacheMax: 8, cacheTtlMs: 3_600_000 });
    });

    it('pretty-prints logs outside production', () => {
      expect(createConfig(parseEnv({ NODE_ENV: 'test' })).logger.pretty).toBe(true);
    });
  });
});
