import type { HealthCheckResult } from './types.js';

/**
 * One readiness check. A rejected promise is reported as a critical failure
 * named `unknown`.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
