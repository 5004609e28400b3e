/**
 * Layer 11: Admin & Management Layer
 *
 * Operational endpoints for the running service.
 *
 * Responsibilities:
 * - Monitor system health
 * - Report readiness to orchestrators
 */

export {
  HealthCheck,
  healthRoutes,
  type HealthStatus,
  type CheckResult,
  type HealthChecker,
  type HealthCheckOptions,
} from './health.ts';
