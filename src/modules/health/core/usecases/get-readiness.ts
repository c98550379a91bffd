import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * A checker that throws counts as a critical failure.
 */
const toCheckResult = (result: PromiseSettledResult<HealthCheckResult>): HealthCheckResult => {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  return {
    name: 'unknown',
    status: 'unhealthy',
    message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    critical: true,
  };
};

/**
 * Critical failure → unhealthy; only non-critical failures → degraded.
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const unhealthy = checks.filter((c) => c.status === 'unhealthy');
  if (unhealthy.some((c) => c.critical !== false)) {
    return 'unhealthy';
  }
  return unhealthy.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs every checker in parallel and folds the results into one response.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const settled = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
