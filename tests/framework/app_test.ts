/**
 * Application Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Application, createApp } from '../../framework/app.ts';
import { HttpError } from '../../framework/http/errors.ts';
import { Router } from '../../framework/router/router.ts';
import { Lifecycle } from '../../framework/runtime/lifecycle.ts';
import { captureLogger, silentLogger } from '../helpers.ts';

function request(path: string, init: RequestInit = {}): Request {
  return new Request(`http://localhost${path}`, init);
}

test('Application - routes with params and client ip', async () => {
  const app = new Application({ logger: silentLogger() });
  app.get('/api/stickers/:id', (ctx) => Response.json({ id: ctx.params.id, ip: ctx.ip }));

  const response = await app.handle(request('/api/stickers/abc'), { remoteAddress: '192.0.2.1' });

  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { id: 'abc', ip: '192.0.2.1' });
});

test('Application - unknown path is 404', async () => {
  const app = new Application({ logger: silentLogger() });

  const response = await app.handle(request('/nowhere'));

  assert.equal(response.status, 404);
  assert.deepEqual(await response.json(), {
    success: false,
    error: { code: 'NOT_FOUND', message: 'No route for GET /nowhere' },
  });
});

test('Application - known path under another method is 405', async () => {
  const app = new Application({ logger: silentLogger() });
  app.get('/items', () => new Response('ok'));

  const response = await app.handle(request('/items', { method: 'DELETE' }));

  assert.equal(response.status, 405);
  assert.deepEqual(await response.json(), {
    success: false,
    error: { code: 'METHOD_NOT_ALLOWED', message: 'Method DELETE not allowed for /items' },
  });
});

test('Application - thrown HttpError becomes the error body', async () => {
  const app = new Application({ logger: silentLogger() });
  app.post('/items', () => {
    throw HttpError.badRequest('name is required', { field: 'name' });
  });

  const response = await app.handle(request('/items', { method: 'POST' }));

  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), {
    success: false,
    error: { code: 'VALIDATION_ERROR', message: 'name is required', details: { field: 'name' } },
  });
});

test('Application - unhandled errors are logged as 500', async () => {
  const { logger, entries } = captureLogger();
  const app = new Application({ logger });
  app.get('/boom', () => {
    throw new Error('database exploded');
  });

  const response = await app.handle(request('/boom'));

  assert.equal(response.status, 500);
  assert.deepEqual(await response.json(), {
    success: false,
    error: { code: 'SERVER_ERROR', message: 'Internal Server Error' },
  });
  assert.equal(entries.length, 1);
  assert.equal(entries[0].message, 'Unhandled request error');
  assert.equal(entries[0].error?.message, 'database exploded');
  assert.deepEqual(entries[0].context, { method: 'GET', path: '/boom' });
});

test('Application - middleware wraps routing', async () => {
  const app = new Application({ logger: silentLogger() });
  app.use(async (ctx, next) => {
    ctx.state.set('user', 'doro');
    const response = await next();
    const headers = new Headers(response.headers);
    headers.set('X-Wrapped', 'yes');
    return new Response(response.body, { status: response.status, headers });
  });
  app.get('/me', (ctx) => Response.json({ user: ctx.state.get('user') }));

  const response = await app.handle(request('/me'));

  assert.equal(response.headers.get('X-Wrapped'), 'yes');
  assert.deepEqual(await response.json(), { user: 'doro' });
});

test('Application - errors thrown by middleware are mapped too', async () => {
  const app = new Application({ logger: silentLogger() });
  app.use(() => {
    throw HttpError.unauthorized('Invalid secret key');
  });
  app.get('/secret', () => new Response('hidden'));

  const response = await app.handle(request('/secret'));

  assert.equal(response.status, 401);
});

test('Application - mounted routers', async () => {
  const app = new Application({ logger: silentLogger() });
  const router = new Router('/api');
  router.get('/ping', (req, res) => res.json({ pong: req.path }));
  app.routes(router);

  const response = await app.handle(request('/api/ping'));

  assert.deepEqual(await response.json(), { pong: '/api/ping' });
});

test('Application - config, init and accessors', async () => {
  const lifecycle = new Lifecycle();
  const app = createApp({ config: { name: 'Doro Test', port: 9100 }, logger: silentLogger(), lifecycle });

  assert.equal(await app.init(), app);
  assert.equal(app.getConfig().getString('name'), 'Doro Test');
  assert.equal(app.getConfig().getNumber('port'), 9100);
  assert.equal(app.getLifecycle(), lifecycle);
  assert.equal(app.getRouter().getRoutes().length, 0);
});

test('Lifecycle - shutdown hooks run in reverse order once', async () => {
  const lifecycle = new Lifecycle();
  const order: string[] = [];
  lifecycle.onShutdown(() => {
    order.push('close database');
  });
  lifecycle.onShutdown(() => {
    order.push('stop server');
  });

  await lifecycle.shutdown('test');
  await lifecycle.shutdown('again');

  assert.deepEqual(order, ['stop server', 'close database']);
  assert.equal(lifecycle.shuttingDown, true);
  assert.equal(lifecycle.signal.aborted, true);
});
