/**
 * Router Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Router } from '../../framework/router/router.ts';

const ok = () => new Response('OK');

test('Router - basic route registration', () => {
  const router = new Router();

  router.get('/test', ok);

  const match = router.match('GET', '/test');
  assert.ok(match);
  assert.deepEqual(match.params, {});
});

test('Router - route with params', () => {
  const router = new Router();

  router.get('/api/stickers/:id', ok);

  const match = router.match('GET', '/api/stickers/123');
  assert.equal(match?.params.id, '123');
});

test('Router - params are URL-decoded', () => {
  const router = new Router();

  router.get('/tags/:name', ok);

  assert.equal(router.match('GET', '/tags/has%20text')?.params.name, 'has text');
});

test('Router - trailing slash matches', () => {
  const router = new Router();

  router.get('/api/stickers/random', ok);

  assert.ok(router.match('GET', '/api/stickers/random/'));
  assert.ok(router.match('GET', '/api/stickers/random'));
});

test('Router - no match returns null', () => {
  const router = new Router();

  router.get('/test', ok);

  assert.equal(router.match('GET', '/nonexistent'), null);
});

test('Router - method must match', () => {
  const router = new Router();

  router.get('/test', ok);

  assert.equal(router.match('POST', '/test'), null);
  assert.equal(router.hasPath('/test'), true);
  assert.equal(router.hasPath('/other'), false);
});

test('Router - first registered route wins', () => {
  const router = new Router();
  const random = () => new Response('random');
  const byId = () => new Response('by id');

  router.get('/stickers/random', random);
  router.get('/stickers/:id', byId);

  assert.equal(router.match('GET', '/stickers/random')?.handler, random);
  assert.equal(router.match('GET', '/stickers/abc')?.handler, byId);
});

test('Router - all() matches any method', () => {
  const router = new Router();

  router.all('/any', ok);

  assert.ok(router.match('DELETE', '/any'));
  assert.ok(router.match('PATCH', '/any'));
});

test('Router - prefix and mount', () => {
  const api = new Router('/api');
  api.get('/stickers', ok, { name: 'stickers.list' });

  const root = new Router();
  root.mount('/v1', api);

  assert.ok(root.match('GET', '/v1/api/stickers'));
  assert.equal(root.getRoutes()[0].path, '/v1/api/stickers');
});

test('Router - named route URL generation', () => {
  const router = new Router();

  router.get('/api/stickers/:id', ok, { name: 'stickers.show' });

  assert.equal(router.url('stickers.show', { id: 'a b' }), '/api/stickers/a%20b');
  assert.equal(router.url('missing'), null);
});

test('Router - duplicate slashes are collapsed', () => {
  const router = new Router('/api/');

  router.get('//health', ok);

  assert.equal(router.getRoutes()[0].path, '/api/health');
});
