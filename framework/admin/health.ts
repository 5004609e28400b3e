/**
 * Health Check
 *
 * System health monitoring and status checks.
 */

import { getHeapStatistics } from 'node:v8';
import { getKV, type KVStore } from '../orm/kv.ts';
import { toError } from '../http/errors.ts';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  checks: Record<string, CheckResult>;
  version?: string;
}

export interface CheckResult {
  status: 'pass' | 'warn' | 'fail';
  message?: string;
  duration?: number;
  timestamp?: string;
}

export type HealthChecker = () => Promise<CheckResult> | CheckResult;

export interface HealthCheckOptions {
  version?: string;
  /** Store probed by the database check, defaults to the shared one */
  store?: KVStore;
  /** Skip the built-in database and memory checks */
  defaultChecks?: boolean;
}

/**
 * Health check manager
 */
export class HealthCheck {
  private checks = new Map<string, HealthChecker>();
  private version?: string;
  private store?: KVStore;

  constructor(options: HealthCheckOptions = {}) {
    this.version = options.version;
    this.store = options.store;
    if (options.defaultChecks !== false) {
      this.registerDefaultChecks();
    }
  }

  /**
   * Register a health check
   */
  register(name: string, checker: HealthChecker): this {
    this.checks.set(name, checker);
    return this;
  }

  /**
   * Run all health checks
   */
  async check(): Promise<HealthStatus> {
    const results: Record<string, CheckResult> = {};
    let hasFailure = false;
    let hasWarning = false;

    for (const [name, checker] of this.checks) {
      const start = performance.now();
      let result: CheckResult;

      try {
        result = { ...(await checker()) };
      } catch (error) {
        result = { status: 'fail', message: toError(error).message };
      }

      result.duration = Math.round((performance.now() - start) * 100) / 100;
      result.timestamp = new Date().toISOString();
      results[name] = result;

      if (result.status === 'fail') hasFailure = true;
      if (result.status === 'warn') hasWarning = true;
    }

    return {
      status: hasFailure ? 'unhealthy' : hasWarning ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      checks: results,
      version: this.version,
    };
  }

  /**
   * Run a quick liveness check
   */
  liveness(): { status: 'ok' } {
    return { status: 'ok' };
  }

  /**
   * Run a readiness check
   */
  async readiness(): Promise<{ status: 'ready' | 'not_ready'; message?: string }> {
    const health = await this.check();

    if (health.status === 'unhealthy') {
      const failed = Object.entries(health.checks)
        .filter(([, result]) => result.status === 'fail')
        .map(([name]) => name);
      return {
        status: 'not_ready',
        message: `Health checks failed: ${failed.join(', ')}`,
      };
    }

    return { status: 'ready' };
  }

  /**
   * Register default health checks
   */
  private registerDefaultChecks(): void {
    this.register('database', async () => {
      const kv = this.store ?? (await getKV());
      await kv.get(['__health_check__']);
      return { status: 'pass', message: 'KV store accessible' };
    });

    this.register('memory', () => {
      const heap = getHeapStatistics();
      const heapUsedPercent = (heap.used_heap_size / heap.heap_size_limit) * 100;

      if (heapUsedPercent > 90) {
        return { status: 'fail', message: `Heap usage critical: ${heapUsedPercent.toFixed(1)}%` };
      }
      if (heapUsedPercent > 75) {
        return { status: 'warn', message: `Heap usage high: ${heapUsedPercent.toFixed(1)}%` };
      }

      return { status: 'pass', message: `Heap usage: ${heapUsedPercent.toFixed(1)}%` };
    });
  }
}

/**
 * Create health check routes
 *
 * `/health` answers without touching any dependency, for load balancers.
 */
export function healthRoutes(health: HealthCheck): Record<string, () => Promise<Response> | Response> {
  return {
    '/health': () => Response.json({ status: 'healthy' }),
    '/health/live': () => Response.json(health.liveness()),
    '/health/ready': async () => {
      const status = await health.readiness();
      return Response.json(status, { status: status.status === 'ready' ? 200 : 503 });
    },
    '/health/checks': async () => {
      const status = await health.check();
      return Response.json(status, { status: status.status === 'unhealthy' ? 503 : 200 });
    },
  };
}
