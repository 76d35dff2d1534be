/**
 * Health module exports
 */

export { makeHealthRoutes, ENDPOINTS, type HealthRoutesDeps } from './shell/rest/routes.js';
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './shell/checkers/index.js';

export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ServiceIdentity,
} from './core/types.js';
