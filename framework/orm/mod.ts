/**
 * Layer 5: Domain/Data Layer (ORM)
 *
 * Core domain objects and data persistence abstractions.
 * Uses a Deno KV database (via @deno/kv) as the primary store.
 *
 * Responsibilities:
 * - Define domain entities and their field rules
 * - Abstract database operations
 * - Enforce data integrity and validation
 * - Provide query interfaces
 */

export {
  Model,
  ModelValidationError,
  type ModelDefinition,
  type FieldDefinition,
  type ModelClass,
  type ModelMeta,
  type StoredRecord,
} from './model.ts';
export {
  Query,
  query,
  compareValues,
  type QueryResult,
  type SortDirection,
  type SortValue,
} from './query.ts';
export {
  KVStore,
  KVConflictError,
  getKV,
  setKV,
  retryOnConflict,
  type RetryOptions,
  type KVStoreOptions,
  type KVEntry,
  type KVEntryMaybe,
  type KVListOptions,
  type Kv,
  type KvKey,
  type AtomicOperation,
} from './kv.ts';
export { readRecord, field, RecordFormatError, type RecordFields } from './record.ts';
export { type Validator, validators } from './validators.ts';
