/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';

export {
  makeDbHealthChecker,
  makeSchemaHealthChecker,
  findMissingColumns,
  LEDGER_COLUMNS,
  type DbHealthCheckerOptions,
  type SchemaHealthCheckerOptions,
} from './shell/checkers/index.js';

export { getReadiness, determineOverallStatus } from './core/usecases/get-readiness.js';

export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
