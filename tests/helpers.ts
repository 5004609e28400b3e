/**
 * Shared test fixtures: in-memory KV, a capturing logger and in-process
 * fakes for the sticker ports.
 */

import type { TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { KVStore } from '../framework/orm/kv.ts';
import { Logger, type LogEntry } from '../framework/telemetry/logger.ts';
import {
  ImageHostError,
  VisionError,
  type DoroPrediction,
  type HostedImage,
  type ImageDescription,
  type ImageFetcher,
  type ImageHost,
  type PictureStore,
  type StickerClassifier,
  type StickerDescriber,
} from '../src/contexts/stickers/application/ports.ts';
import { Sticker, type CreateStickerParams } from '../src/contexts/stickers/domain/sticker.ts';
import { isFailure, type ServiceResult } from '../src/contexts/stickers/application/result.ts';
import type { ErrorCode } from '../framework/http/errors.ts';

/**
 * Open an in-memory store that is closed when the test ends
 */
export async function openStore(t: TestContext): Promise<KVStore> {
  const store = new KVStore();
  await store.init();
  t.after(() => store.close());
  return store;
}

/**
 * Logger that keeps its entries instead of printing them
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

/**
 * Unwrap a successful service result, failing the test otherwise
 */
export function expectSuccess<T>(result: ServiceResult<T>): { success: true } & T {
  if (isFailure(result)) {
    assert.fail(`expected success, got ${result.code}: ${result.error}`);
  }
  return result;
}

export function assertFailure<T>(result: ServiceResult<T>, code: ErrorCode, error: string): void {
  if (!isFailure(result)) {
    assert.fail(`expected ${code}, got success`);
  }
  assert.equal(result.code, code);
  assert.equal(result.error, error);
}

export function silentLogger(): Logger {
  return new Logger({ output: () => {} });
}

/**
 * 32-character hex md5 built from a short seed
 */
export function fakeMd5(seed: number): string {
  return seed.toString(16).padStart(32, '0');
}

export function newSticker(overrides: Partial<CreateStickerParams> = {}): Sticker {
  return Sticker.create({
    md5: fakeMd5(1),
    url: 'https://img.example.test/images/1.png',
    description: 'Happy DORO',
    doroConfidence: 0.9,
    ...overrides,
  });
}

export function prediction(probability: number): DoroPrediction {
  const isDoro = probability >= 0.5;
  return {
    isDoro,
    confidence: isDoro ? probability : 1 - probability,
    probabilities: { doro: probability, nonDoro: 1 - probability },
  };
}

export class FakeClassifier implements StickerClassifier {
  calls = 0;

  constructor(private result: DoroPrediction | Error = prediction(0.9)) {}

  predict(): Promise<DoroPrediction> {
    this.calls++;
    if (this.result instanceof Error) return Promise.reject(this.result);
    return Promise.resolve(this.result);
  }

  static failing(message = 'model offline'): FakeClassifier {
    return new FakeClassifier(new VisionError(message));
  }
}

export class FakeDescriber implements StickerDescriber {
  constructor(
    private result: ImageDescription = { description: 'Hi DORO', hasText: false, isSafe: true }
  ) {}

  describe(): Promise<ImageDescription> {
    return Promise.resolve(this.result);
  }
}

export class FakeImageHost implements ImageHost {
  uploads: { filename: string; mimeType: string; size: number }[] = [];
  private failure: Error | null = null;
  private fixedUrl: string | null = null;

  upload(image: Uint8Array, filename: string, mimeType: string): Promise<HostedImage> {
    if (this.failure) return Promise.reject(this.failure);
    this.uploads.push({ filename, mimeType, size: image.byteLength });
    return Promise.resolve({
      url: this.fixedUrl ?? `https://img.example.test/images/${this.uploads.length}.png`,
      width: 240,
      height: 240,
    });
  }

  failWith(message: string): this {
    this.failure = new ImageHostError(message, 500);
    return this;
  }

  answerWithUrl(url: string): this {
    this.fixedUrl = url;
    return this;
  }
}

export class FakeFetcher implements ImageFetcher {
  constructor(private images: Map<string, Uint8Array> = new Map()) {}

  fetch(url: string): Promise<Uint8Array | null> {
    return Promise.resolve(this.images.get(url) ?? null);
  }
}

export class MemoryPictureStore implements PictureStore {
  files = new Map<string, Uint8Array>();

  save(name: string, data: Uint8Array): Promise<void> {
    this.files.set(name, data);
    return Promise.resolve();
  }

  remove(name: string): Promise<void> {
    this.files.delete(name);
    return Promise.resolve();
  }
}
