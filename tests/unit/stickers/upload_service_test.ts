/**
 * Upload Service Tests
 */

import { test, type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { UploadService, md5Hex } from '../../../src/contexts/stickers/application/upload_service.ts';
import { StickerRepository } from '../../../src/contexts/stickers/infrastructure/sticker_repository.ts';
import type { ImageDescription, PictureStore } from '../../../src/contexts/stickers/application/ports.ts';
import {
  FakeClassifier,
  FakeDescriber,
  FakeImageHost,
  MemoryPictureStore,
  assertFailure,
  captureLogger,
  expectSuccess,
  newSticker,
  openStore,
  prediction,
} from '../../helpers.ts';

const IMAGE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10, 1, 2, 3]);
const IMAGE_MD5 = createHash('md5').update(IMAGE).digest('hex');

function command() {
  return { image: IMAGE, mimeType: 'image/png', filename: 'doro.png', ip: '192.0.2.20', userAgent: 'test-agent' };
}

interface SetupOptions {
  classifier?: FakeClassifier;
  description?: ImageDescription;
  pictureStore?: PictureStore;
}

async function setup(t: TestContext, options: SetupOptions = {}) {
  const store = await openStore(t);
  const repository = new StickerRepository(store);
  const classifier = options.classifier ?? new FakeClassifier();
  const imageHost = new FakeImageHost();
  const pictures = new MemoryPictureStore();
  const { logger, entries } = captureLogger();
  const service = new UploadService({
    repository,
    classifier,
    describer: new FakeDescriber(options.description),
    imageHost,
    pictureStore: options.pictureStore ?? pictures,
    logger,
  });
  return { repository, classifier, imageHost, pictures, entries, service };
}

test('md5Hex - hex digest of the bytes', () => {
  assert.equal(md5Hex(new Uint8Array()), 'd41d8cd98f00b204e9800998ecf8427e');
  assert.equal(md5Hex(IMAGE), IMAGE_MD5);
});

test('UploadService - admits a DORO sticker', async (t) => {
  const { service, repository, imageHost, pictures } = await setup(t, {
    description: { description: 'Doro sign', hasText: true, isSafe: true },
  });

  const result = expectSuccess(await service.upload(command()));

  assert.equal(result.message, 'Sticker uploaded');
  const sticker = result.sticker;
  assert.equal(sticker.md5, IMAGE_MD5);
  assert.equal(sticker.url, 'https://img.example.test/images/1.png');
  assert.equal(sticker.description, 'Doro sign');
  assert.equal(sticker.doroConfidence, 0.9);
  assert.deepEqual(sticker.tags, ['has-text']);
  assert.equal(sticker.width, 240);
  assert.equal(sticker.height, 240);
  assert.equal(sticker.fileSize, IMAGE.byteLength);

  assert.deepEqual(imageHost.uploads, [{ filename: 'doro.png', mimeType: 'image/png', size: IMAGE.byteLength }]);
  assert.deepEqual([...pictures.files.keys()], [`${IMAGE_MD5}.png`]);
  assert.equal((await repository.findByMd5(IMAGE_MD5))?.id, sticker.id);
  assert.equal((await repository.findTag('has-text'))?.usageCount, 1);

  const logs = await repository.logsFor(sticker.id);
  assert.equal(logs.length, 1);
  assert.equal(logs[0].operation, 'upload');
  assert.equal(logs[0].ipAddress, '192.0.2.20');
  assert.equal(logs[0].userAgent, 'test-agent');
  assert.equal(logs[0].newDescription, 'Doro sign');
});

test('UploadService - stickers without text get no tags', async (t) => {
  const { service } = await setup(t);

  const result = expectSuccess(await service.upload(command()));

  assert.equal(result.sticker.description, 'Hi DORO');
  assert.deepEqual(result.sticker.tags, []);
});

test('UploadService - duplicate images are rejected before classifying', async (t) => {
  const { service, repository, classifier, imageHost } = await setup(t);
  const existing = newSticker({ md5: IMAGE_MD5 });
  await repository.insert(existing);

  const result = await service.upload(command());

  assertFailure(result, 'CONFLICT', 'Sticker already exists');
  assert.deepEqual(result.success ? undefined : result.details, { sticker_id: existing.id });
  assert.equal(classifier.calls, 0);
  assert.equal(imageHost.uploads.length, 0);
});

test('UploadService - non-DORO images are rejected', async (t) => {
  const { service, imageHost } = await setup(t, { classifier: new FakeClassifier(prediction(0.2)) });

  const result = await service.upload(command());

  assertFailure(result, 'VALIDATION_ERROR', 'Image is not a DORO sticker');
  assert.deepEqual(result.success ? undefined : result.details, { is_doro: false, confidence: 0.8 });
  assert.equal(imageHost.uploads.length, 0);
});

test('UploadService - low-confidence DORO verdicts are rejected', async (t) => {
  const { service } = await setup(t, { classifier: new FakeClassifier(prediction(0.55)) });

  const result = await service.upload(command());

  assertFailure(result, 'VALIDATION_ERROR', 'Image is not a DORO sticker');
  assert.deepEqual(result.success ? undefined : result.details, { is_doro: true, confidence: 0.55 });
});

test('UploadService - unsafe content is rejected', async (t) => {
  const { service, imageHost, entries } = await setup(t, {
    description: { description: 'Unsafe DORO sticker', hasText: false, isSafe: false },
  });

  const result = await service.upload(command());

  assertFailure(result, 'VALIDATION_ERROR', 'Sticker content is unsafe');
  assert.deepEqual(result.success ? undefined : result.details, { content_safety: 'unsafe' });
  assert.equal(imageHost.uploads.length, 0);
  assert.deepEqual(
    entries.map((entry) => [entry.level, entry.message]),
    [['warn', 'Rejected unsafe upload']]
  );
});

test('UploadService - vision failures are upstream errors', async (t) => {
  const { service, entries } = await setup(t, { classifier: FakeClassifier.failing('model offline') });

  assertFailure(await service.upload(command()), 'UPSTREAM_ERROR', 'model offline');
  assert.equal(entries[0].message, 'Upstream service failed');
  assert.equal(entries[0].error?.message, 'model offline');
});

test('UploadService - image host failures are upstream errors', async (t) => {
  const { service, repository, imageHost } = await setup(t);
  imageHost.failWith('Image upload failed: 500 - busy');

  assertFailure(await service.upload(command()), 'UPSTREAM_ERROR', 'Image upload failed: 500 - busy');
  assert.equal(await repository.findByMd5(IMAGE_MD5), null);
});

test('UploadService - long forwarded addresses are cut to fit the log', async (t) => {
  const { service, repository } = await setup(t);
  const forwarded = '198.51.100.7, '.repeat(4);

  const result = expectSuccess(await service.upload({ ...command(), ip: forwarded }));

  const logs = await repository.logsFor(result.sticker.id);
  assert.equal(logs.length, 1);
  assert.equal(logs[0].ipAddress, forwarded.slice(0, 50));
  assert.equal(logs[0].ipAddress.length, 50);
});

test('UploadService - unusable host urls are upstream errors and leave nothing behind', async (t) => {
  const { service, repository, imageHost, pictures, entries } = await setup(t);
  imageHost.answerWithUrl('not-a-url');

  const result = await service.upload(command());

  assertFailure(result, 'UPSTREAM_ERROR', 'Image host sent an unusable image: url must be a valid URL');
  assert.equal(await repository.findByMd5(IMAGE_MD5), null);
  assert.equal(pictures.files.size, 0);
  assert.equal(entries.at(-1)?.message, 'Upstream service failed');
});

test('UploadService - a failing local copy does not block the upload', async (t) => {
  const failingStore: PictureStore = {
    save: () => Promise.reject(new Error('disk full')),
    remove: () => Promise.resolve(),
  };
  const { service, entries } = await setup(t, { pictureStore: failingStore });

  expectSuccess(await service.upload(command()));

  const warning = entries.find((entry) => entry.level === 'warn');
  assert.equal(warning?.message, 'Failed to keep local picture copy');
  assert.deepEqual(warning?.context, { service: 'upload', name: `${IMAGE_MD5}.png`, error: 'disk full' });
});

test('UploadService - predict returns the classifier verdict', async (t) => {
  const { service } = await setup(t, { classifier: new FakeClassifier(prediction(0.75)) });

  const result = expectSuccess(await service.predict(IMAGE, 'image/png'));

  assert.deepEqual(result.prediction, {
    isDoro: true,
    confidence: 0.75,
    probabilities: { doro: 0.75, nonDoro: 0.25 },
  });
});

test('UploadService - predict reports vision failures', async (t) => {
  const { service } = await setup(t, { classifier: FakeClassifier.failing('OPENAI_API_KEY is not set') });

  assertFailure(await service.predict(IMAGE, 'image/png'), 'UPSTREAM_ERROR', 'OPENAI_API_KEY is not set');
});
