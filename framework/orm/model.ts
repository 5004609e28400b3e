/**
 * Model Definition
 *
 * Provides a base class for defining domain models with declarative
 * field validation and persistence to KV.
 */

import { randomUUID } from 'node:crypto';
import { getKV, type KVStore, type KvKey } from './kv.ts';
import type { Validator } from './validators.ts';

export interface FieldDefinition {
  type: 'string' | 'number' | 'boolean' | 'array';
  required?: boolean;
  validate?: Validator[];
}

export interface ModelDefinition {
  name: string;
  prefix: string;
  fields: Record<string, FieldDefinition>;
}

export interface ModelMeta {
  id?: string;
  createdAt?: Date;
  updatedAt?: Date;
  versionstamp?: string | null;
}

/**
 * Shape written to KV: the model data plus identity and ISO timestamps
 */
export type StoredRecord<T> = T & { id: string; createdAt: string; updatedAt: string };

/**
 * Static side of a model class, as used by finders and queries
 */
export interface ModelClass<M> {
  readonly definition: ModelDefinition;
  fromRecord(value: unknown, versionstamp?: string | null): M;
}

/**
 * Raised by save() when field validation fails
 */
export class ModelValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join(', ')}`);
    this.name = 'ModelValidationError';
    this.errors = errors;
  }
}

/**
 * Base Model class
 */
export abstract class Model<T extends object> {
  readonly id: string;
  readonly createdAt: Date;
  updatedAt: Date;
  /** Versionstamp of the stored copy this instance was read from */
  versionstamp: string | null;

  protected data: T;

  constructor(data: T, meta: ModelMeta = {}) {
    const now = new Date();
    this.data = data;
    this.id = meta.id ?? randomUUID();
    this.createdAt = meta.createdAt ?? now;
    this.updatedAt = meta.updatedAt ?? this.createdAt;
    this.versionstamp = meta.versionstamp ?? null;
  }

  protected abstract get definition(): ModelDefinition;

  /**
   * Get the KV key for this model
   */
  get key(): KvKey {
    return [this.definition.prefix, this.id];
  }

  /**
   * Validate the model data against its field definitions
   */
  validate(): string[] {
    const values = new Map<string, unknown>(Object.entries(this.data));
    const errors: string[] = [];

    for (const [field, fieldDef] of Object.entries(this.definition.fields)) {
      const value = values.get(field);

      if (value === undefined || value === null) {
        if (fieldDef.required) errors.push(`${field} is required`);
        continue;
      }

      if (fieldDef.type === 'array' ? !Array.isArray(value) : typeof value !== fieldDef.type) {
        errors.push(`${field} must be a ${fieldDef.type}`);
        continue;
      }

      for (const validator of fieldDef.validate ?? []) {
        const error = validator(value, field);
        if (error) errors.push(error);
      }
    }

    return errors;
  }

  /**
   * Throw a ModelValidationError when validation fails
   */
  assertValid(): void {
    const errors = this.validate();
    if (errors.length > 0) {
      throw new ModelValidationError(errors);
    }
  }

  /**
   * Bump the update timestamp
   */
  touch(now: Date = new Date()): void {
    this.updatedAt = now;
  }

  /**
   * Convert to the stored representation
   */
  toRecord(): StoredRecord<T> {
    return {
      ...this.data,
      id: this.id,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.updatedAt.toISOString(),
    };
  }

  /**
   * Validate and save the model to KV
   */
  async save(store?: KVStore): Promise<void> {
    this.assertValid();
    this.touch();

    const kv = store ?? (await getKV());
    await kv.set(this.key, this.toRecord());
  }

  /**
   * Delete the model from KV
   */
  async delete(store?: KVStore): Promise<void> {
    const kv = store ?? (await getKV());
    await kv.delete(this.key);
  }

  /**
   * Find by ID
   */
  static async findById<M>(this: ModelClass<M>, id: string, store?: KVStore): Promise<M | null> {
    const kv = store ?? (await getKV());
    const entry = await kv.getEntry<unknown>([this.definition.prefix, id]);

    if (entry.value === null) return null;

    return this.fromRecord(entry.value, entry.versionstamp);
  }

  /**
   * Find all records
   */
  static async findAll<M>(this: ModelClass<M>, store?: KVStore): Promise<M[]> {
    const kv = store ?? (await getKV());
    const entries = await kv.list<unknown>([this.definition.prefix]);

    return entries.map(({ value, versionstamp }) => this.fromRecord(value, versionstamp));
  }
}
