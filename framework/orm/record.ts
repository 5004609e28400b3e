/**
 * Stored Record Readers
 *
 * Values come back from KV as unknown; these helpers rebuild typed
 * fields from them and fail loudly on corrupt records.
 */

export type RecordFields = Map<string, unknown>;

/**
 * Raised when a stored value does not have the expected shape
 */
export class RecordFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordFormatError';
  }
}

/**
 * Open a stored value as a field map
 */
export function readRecord(value: unknown): RecordFields {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new RecordFormatError('Stored record is not an object');
  }
  return new Map<string, unknown>(Object.entries(value));
}

export const field = {
  string(record: RecordFields, name: string): string {
    const value = record.get(name);
    if (typeof value !== 'string') {
      throw new RecordFormatError(`Stored field ${name} is not a string`);
    }
    return value;
  },

  number(record: RecordFields, name: string, fallback?: number): number {
    const value = record.get(name);
    if (typeof value === 'number') return value;
    if (value === undefined && fallback !== undefined) return fallback;
    throw new RecordFormatError(`Stored field ${name} is not a number`);
  },

  optionalNumber(record: RecordFields, name: string): number | undefined {
    const value = record.get(name);
    return typeof value === 'number' ? value : undefined;
  },

  stringArray(record: RecordFields, name: string): string[] {
    const value = record.get(name);
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      throw new RecordFormatError(`Stored field ${name} is not an array`);
    }
    return value.filter((item): item is string => typeof item === 'string');
  },

  date(record: RecordFields, name: string): Date {
    const date = new Date(field.string(record, name));
    if (Number.isNaN(date.getTime())) {
      throw new RecordFormatError(`Stored field ${name} is not a date`);
    }
    return date;
  },

  oneOf<T extends string>(record: RecordFields, name: string, allowed: readonly T[]): T {
    const value = record.get(name);
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new RecordFormatError(`Stored field ${name} must be one of: ${allowed.join(', ')}`);
    }
    return match;
  },
};
