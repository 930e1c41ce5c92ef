import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export type OverallStatus = ReadinessResponse['status'];

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  /** Seconds since the routes were registered */
  uptime: number;
  /** ISO-8601 */
  timestamp: string;
}

const toCheckResult = (settled: PromiseSettledResult<HealthCheckResult>): HealthCheckResult =>
  settled.status === 'fulfilled'
    ? settled.value
    : {
        name: 'unknown',
        status: 'unhealthy',
        message: settled.reason instanceof Error ? settled.reason.message : 'Check failed',
        critical: true,
      };

export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => results.map(toCheckResult);

/**
 * `unhealthy` if a critical check failed (checks are critical unless they
 * say otherwise), `degraded` if only optional ones did, else `ok`.
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): OverallStatus => {
  let status: OverallStatus = 'ok';
  for (const check of checks) {
    if (check.status === 'healthy') continue;
    if (check.critical === false) {
      status = 'degraded';
    } else {
      return 'unhealthy';
    }
  }
  return status;
};

/**
 * Runs every checker concurrently; one failing checker never hides the
 * others' results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const checks = mapCheckResults(await Promise.allSettled(checkers.map((check) => check())));

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
