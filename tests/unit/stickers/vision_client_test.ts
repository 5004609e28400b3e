/**
 * Vision Client Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_DESCRIPTION,
  UNSAFE_DESCRIPTION,
  VisionClient,
  parseClassification,
  parseDescription,
  type VisionRequest,
} from '../../../src/contexts/stickers/infrastructure/vision_client.ts';
import { captureLogger, silentLogger } from '../../helpers.ts';

const IMAGE = new Uint8Array([1, 2, 3]);

test('parseClassification - probability above one half is a DORO', () => {
  assert.deepEqual(parseClassification('{"doro_probability": 0.87}'), {
    isDoro: true,
    confidence: 0.87,
    probabilities: { doro: 0.87, nonDoro: 0.13 },
  });
});

test('parseClassification - JSON inside chatter', () => {
  assert.deepEqual(parseClassification('Sure! {"doro_probability": 0.3} Hope that helps.'), {
    isDoro: false,
    confidence: 0.7,
    probabilities: { doro: 0.3, nonDoro: 0.7 },
  });
});

test('parseClassification - probability is clamped', () => {
  assert.deepEqual(parseClassification('{"doro_probability": 7}'), {
    isDoro: true,
    confidence: 1,
    probabilities: { doro: 1, nonDoro: 0 },
  });
});

test('parseClassification - unreadable replies are not DORO', () => {
  const notDoro = { isDoro: false, confidence: 1, probabilities: { doro: 0, nonDoro: 1 } };

  assert.deepEqual(parseClassification(null), notDoro);
  assert.deepEqual(parseClassification('I cannot tell'), notDoro);
  assert.deepEqual(parseClassification('{not json}'), notDoro);
  assert.deepEqual(parseClassification('{"doro_probability": "high"}'), notDoro);
});

test('parseDescription - JSON reply is truncated to ten characters', () => {
  assert.deepEqual(parseDescription('{"description": "Good morning DORO", "has_text": true, "is_safe": true}'), {
    description: 'Good morni',
    hasText: true,
    isSafe: true,
  });
});

test('parseDescription - fenced JSON with blank or none description', () => {
  assert.deepEqual(parseDescription('```json\n{"description": "  ", "has_text": false, "is_safe": true}\n```'), {
    description: DEFAULT_DESCRIPTION,
    hasText: false,
    isSafe: true,
  });
  assert.deepEqual(parseDescription('{"description": "None", "is_safe": true}').description, DEFAULT_DESCRIPTION);
});

test('parseDescription - flags must be real booleans', () => {
  assert.deepEqual(parseDescription('{"description": 5, "has_text": "yes", "is_safe": true}'), {
    description: 'Wild DORO sticker',
    hasText: false,
    isSafe: true,
  });
});

test('parseDescription - unsafe content replaces the description', () => {
  assert.deepEqual(parseDescription('{"description": "hi", "has_text": true, "is_safe": false}'), {
    description: UNSAFE_DESCRIPTION,
    hasText: true,
    isSafe: false,
  });
  assert.deepEqual(parseDescription('{"description": "hi", "has_text": true}').isSafe, false);
});

test('parseDescription - broken JSON is treated as unsafe', () => {
  assert.deepEqual(parseDescription('{description: hi}'), {
    description: UNSAFE_DESCRIPTION,
    hasText: false,
    isSafe: false,
  });
});

test('parseDescription - plain text replies', () => {
  assert.deepEqual(parseDescription('Caption: hello there'), {
    description: 'Caption: h',
    hasText: true,
    isSafe: true,
  });
  assert.deepEqual(parseDescription('A picture with violence'), {
    description: UNSAFE_DESCRIPTION,
    hasText: false,
    isSafe: false,
  });
  assert.deepEqual(parseDescription(''), {
    description: DEFAULT_DESCRIPTION,
    hasText: false,
    isSafe: true,
  });
});

test('VisionClient - predict sends the image and parses the reply', async () => {
  const requests: VisionRequest[] = [];
  const client = new VisionClient({
    model: 'test-model',
    logger: silentLogger(),
    complete: (request) => {
      requests.push(request);
      return Promise.resolve('{"doro_probability": 0.9}');
    },
  });

  const prediction = await client.predict(IMAGE, 'image/webp');

  assert.equal(prediction.isDoro, true);
  assert.equal(prediction.confidence, 0.9);
  assert.equal(requests.length, 1);
  assert.equal(requests[0].image, IMAGE);
  assert.equal(requests[0].mimeType, 'image/webp');
  assert.equal(requests[0].maxTokens, 50);
  assert.match(requests[0].prompt, /doro_probability/);
});

test('VisionClient - predict wraps model failures', async () => {
  const client = new VisionClient({
    model: 'test-model',
    logger: silentLogger(),
    complete: () => Promise.reject(new Error('rate limited')),
  });

  await assert.rejects(client.predict(IMAGE, 'image/png'), {
    name: 'VisionError',
    message: 'Vision classification failed: rate limited',
  });
});

test('VisionClient - predict without an API key', async () => {
  const client = new VisionClient({ model: 'test-model', logger: silentLogger() });

  await assert.rejects(client.predict(IMAGE, 'image/png'), {
    name: 'VisionError',
    message: 'Vision classification failed: OPENAI_API_KEY is not set',
  });
});

test('VisionClient - describe parses the reply', async () => {
  const requests: VisionRequest[] = [];
  const client = new VisionClient({
    model: 'test-model',
    logger: silentLogger(),
    complete: (request) => {
      requests.push(request);
      return Promise.resolve('{"description": "Doro", "has_text": true, "is_safe": true}');
    },
  });

  assert.deepEqual(await client.describe(IMAGE, 'image/png'), {
    description: 'Doro',
    hasText: true,
    isSafe: true,
  });
  assert.equal(requests[0].maxTokens, 150);
});

test('VisionClient - describe failures fall back to unsafe', async () => {
  const { logger, entries } = captureLogger();
  const client = new VisionClient({
    model: 'test-model',
    logger,
    complete: () => Promise.reject(new Error('timeout')),
  });

  assert.deepEqual(await client.describe(IMAGE, 'image/png'), {
    description: DEFAULT_DESCRIPTION,
    hasText: false,
    isSafe: false,
  });
  assert.equal(entries.length, 1);
  assert.equal(entries[0].message, 'Image description failed');
  assert.equal(entries[0].error?.message, 'timeout');
  assert.deepEqual(entries[0].context, { component: 'vision' });
});
