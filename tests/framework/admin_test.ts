/**
 * Health Check Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { HealthCheck, healthRoutes } from '../../framework/admin/health.ts';
import { openStore } from '../helpers.ts';

test('HealthCheck - all passing is healthy', async () => {
  const health = new HealthCheck({ version: '1.2.3', defaultChecks: false });
  health.register('always', () => ({ status: 'pass' }));

  const status = await health.check();

  assert.equal(status.status, 'healthy');
  assert.equal(status.version, '1.2.3');
  assert.equal(status.checks.always.status, 'pass');
  assert.equal(typeof status.checks.always.duration, 'number');
});

test('HealthCheck - a warning degrades, a failure is unhealthy', async () => {
  const degraded = new HealthCheck({ defaultChecks: false }).register('slow', () => ({ status: 'warn' }));
  const unhealthy = new HealthCheck({ defaultChecks: false })
    .register('slow', () => ({ status: 'warn' }))
    .register('broken', () => {
      throw new Error('connection refused');
    });

  assert.equal((await degraded.check()).status, 'degraded');

  const status = await unhealthy.check();
  assert.equal(status.status, 'unhealthy');
  assert.deepEqual(
    { status: status.checks.broken.status, message: status.checks.broken.message },
    { status: 'fail', message: 'connection refused' }
  );
});

test('HealthCheck - readiness names failed checks', async () => {
  const health = new HealthCheck({ defaultChecks: false })
    .register('database', () => ({ status: 'fail' }))
    .register('cache', () => ({ status: 'fail' }))
    .register('memory', () => ({ status: 'pass' }));

  assert.deepEqual(await health.readiness(), {
    status: 'not_ready',
    message: 'Health checks failed: database, cache',
  });
  assert.deepEqual(health.liveness(), { status: 'ok' });
});

test('HealthCheck - default database check uses the given store', async (t) => {
  const store = await openStore(t);
  const health = new HealthCheck({ store });

  const status = await health.check();

  assert.deepEqual(Object.keys(status.checks), ['database', 'memory']);
  assert.equal(status.checks.database.status, 'pass');
  assert.equal(status.checks.database.message, 'KV store accessible');
});

test('healthRoutes - /health answers without running checks', async () => {
  let ran = false;
  const routes = healthRoutes(
    new HealthCheck({ defaultChecks: false }).register('probe', () => {
      ran = true;
      return { status: 'fail' };
    })
  );

  const response = await routes['/health']();

  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { status: 'healthy' });
  assert.equal(ran, false);
});

test('healthRoutes - readiness is 503 when a check fails', async () => {
  const routes = healthRoutes(
    new HealthCheck({ defaultChecks: false }).register('database', () => ({ status: 'fail' }))
  );

  const ready = await routes['/health/ready']();
  const checks = await routes['/health/checks']();
  const live = await routes['/health/live']();

  assert.equal(ready.status, 503);
  assert.deepEqual(await ready.json(), { status: 'not_ready', message: 'Health checks failed: database' });
  assert.equal(checks.status, 503);
  assert.deepEqual(await live.json(), { status: 'ok' });
});
