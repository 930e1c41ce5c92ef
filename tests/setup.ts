/**
 * Global test setup: quiet logs and a test environment for every suite.
 */

import { beforeAll } from 'vitest';

beforeAll(() => {
  process.env['NODE_ENV'] = 'test';
  process.env['LOG_LEVEL'] = 'silent';
});
