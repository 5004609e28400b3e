/**
 * KV Store Wrapper
 *
 * Provides a high-level interface over a Deno KV database opened through
 * the @deno/kv package. Without a path the database lives in memory; a
 * file path opens a local database and an http(s) URL a remote one.
 */

import { openKv } from '@deno/kv';
import { withDbSpan } from '../telemetry/otel.ts';

export type Kv = Awaited<ReturnType<typeof openKv>>;
export type KvKey = Parameters<Kv['get']>[0];
export type AtomicOperation = ReturnType<Kv['atomic']>;

export interface KVStoreOptions {
  path?: string;
}

export interface KVEntry<T> {
  key: KvKey;
  value: T;
  versionstamp: string;
}

export interface KVEntryMaybe<T> {
  key: KvKey;
  value: T | null;
  versionstamp: string | null;
}

export interface KVListOptions {
  limit?: number;
  reverse?: boolean;
}

/**
 * Raised when an atomic commit fails its versionstamp checks
 */
export class KVConflictError extends Error {
  constructor(message = 'Concurrent modification detected') {
    super(message);
    this.name = 'KVConflictError';
  }
}

/**
 * KV Store wrapper
 */
export class KVStore {
  private kv: Kv | null = null;

  constructor(private options: KVStoreOptions = {}) {}

  /**
   * Open the database
   */
  async init(): Promise<void> {
    if (this.kv) return;
    this.kv = await openKv(this.options.path);
  }

  /**
   * Get the underlying KV instance
   */
  get raw(): Kv {
    if (!this.kv) {
      throw new Error('KV store not initialized. Call init() first.');
    }
    return this.kv;
  }

  /**
   * Get a value by key
   */
  async get<T>(key: KvKey): Promise<T | null> {
    const entry = await this.getEntry<T>(key);
    return entry.value;
  }

  /**
   * Get a value with its versionstamp, for use in atomic checks
   */
  async getEntry<T>(key: KvKey): Promise<KVEntryMaybe<T>> {
    return await withDbSpan('get', key, async () => {
      const result = await this.raw.get<T>(key);
      return { key: result.key, value: result.value, versionstamp: result.versionstamp };
    });
  }

  /**
   * Get multiple values by keys
   */
  async getMany<T>(keys: KvKey[]): Promise<(T | null)[]> {
    return await withDbSpan('getMany', keys[0] ?? [], async (span) => {
      span?.setAttribute('db.batch.size', keys.length);
      return await Promise.all(keys.map((key) => this.get<T>(key)));
    });
  }

  /**
   * Set a value
   */
  async set<T>(key: KvKey, value: T): Promise<void> {
    await withDbSpan('set', key, async () => {
      await this.raw.set(key, value);
    });
  }

  /**
   * Delete a value
   */
  async delete(key: KvKey): Promise<void> {
    await withDbSpan('delete', key, async () => {
      await this.raw.delete(key);
    });
  }

  /**
   * List entries under a prefix
   */
  async list<T>(prefix: KvKey, options: KVListOptions = {}): Promise<KVEntry<T>[]> {
    return await withDbSpan('list', prefix, async (span) => {
      if (options.limit) {
        span?.setAttribute('db.kv.limit', options.limit);
      }

      const results: KVEntry<T>[] = [];
      const entries = this.raw.list<T>({ prefix }, options);

      for await (const entry of entries) {
        results.push({ key: entry.key, value: entry.value, versionstamp: entry.versionstamp });
      }

      span?.setAttribute('db.result.count', results.length);
      return results;
    });
  }

  /**
   * Start an atomic operation
   */
  atomic(): AtomicOperation {
    return this.raw.atomic();
  }

  /**
   * Commit an atomic operation; false when a check failed
   */
  async commit(operation: AtomicOperation): Promise<boolean> {
    return await withDbSpan('commit', [], async () => {
      const result = await operation.commit();
      return result.ok;
    });
  }

  /**
   * Commit an atomic operation, raising KVConflictError when a check failed
   */
  async commitOrThrow(operation: AtomicOperation): Promise<void> {
    if (!(await this.commit(operation))) {
      throw new KVConflictError();
    }
  }

  /**
   * Close the KV store
   */
  close(): void {
    if (this.kv) {
      this.kv.close();
      this.kv = null;
    }
  }
}

export interface RetryOptions {
  /** Total tries, the first included */
  attempts?: number;
  /** Upper bound of the first wait; doubles with each retry */
  baseDelayMs?: number;
  maxDelayMs?: number;
}

/**
 * Run an optimistic read-modify-commit function, retrying on conflicts
 * after a random wait that grows exponentially
 */
export async function retryOnConflict<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts = 10, baseDelayMs = 5, maxDelayMs = 200 } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof KVConflictError) || attempt >= attempts) {
        throw error;
      }
    }

    const ceiling = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
    await sleep(Math.random() * ceiling);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Singleton instance
let defaultStore: KVStore | null = null;

/**
 * Get the default KV store, opening an in-memory one on first use
 */
export async function getKV(): Promise<KVStore> {
  if (!defaultStore) {
    defaultStore = new KVStore();
  }
  await defaultStore.init();
  return defaultStore;
}

/**
 * Replace the default KV store
 */
export function setKV(store: KVStore): void {
  defaultStore = store;
}
