/**
 * Query Builder
 *
 * Fluent interface for filtering, sorting and paging the records of a
 * model. KV has no secondary query engine, so the prefix is scanned and
 * the rest happens in memory.
 */

import { getKV, type KVStore } from './kv.ts';
import type { ModelClass } from './model.ts';

export interface QueryResult<T> {
  data: T[];
  count: number;
  hasMore: boolean;
}

export type SortDirection = 'asc' | 'desc';
export type SortValue = string | number | Date | null | undefined;

/**
 * Compare two sort keys ascending, with null and undefined last
 */
export function compareValues(a: SortValue, b: SortValue): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;

  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : 1;
  }

  const left = a instanceof Date ? a.getTime() : Number(a);
  const right = b instanceof Date ? b.getTime() : Number(b);

  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Query builder over a model's KV prefix
 */
export class Query<M> {
  private filters: ((item: M) => boolean)[] = [];
  private sorters: ((a: M, b: M) => number)[] = [];
  private limitValue: number | null = null;
  private offsetValue = 0;

  constructor(
    private model: ModelClass<M>,
    private store?: KVStore
  ) {}

  /**
   * Add a filter function
   */
  filter(fn: (item: M) => boolean): this {
    this.filters.push(fn);
    return this;
  }

  /**
   * Sort results; later calls break ties of earlier ones
   */
  orderBy(selector: (item: M) => SortValue, direction: SortDirection = 'asc'): this {
    this.sorters.push((a, b) => {
      const comparison = compareValues(selector(a), selector(b));
      return direction === 'asc' ? comparison : -comparison;
    });
    return this;
  }

  /**
   * Limit results
   */
  limit(count: number): this {
    this.limitValue = count;
    return this;
  }

  /**
   * Skip results
   */
  offset(count: number): this {
    this.offsetValue = count;
    return this;
  }

  /**
   * Execute the query
   */
  async execute(): Promise<QueryResult<M>> {
    const kv = this.store ?? (await getKV());
    const entries = await kv.list<unknown>([this.model.definition.prefix]);

    let items = entries
      .map(({ value, versionstamp }) => this.model.fromRecord(value, versionstamp))
      .filter((item) => this.filters.every((fn) => fn(item)));

    if (this.sorters.length > 0) {
      items.sort((a, b) => {
        for (const sorter of this.sorters) {
          const result = sorter(a, b);
          if (result !== 0) return result;
        }
        return 0;
      });
    }

    const totalCount = items.length;

    if (this.offsetValue > 0) {
      items = items.slice(this.offsetValue);
    }

    const hasMore = this.limitValue !== null && items.length > this.limitValue;
    if (this.limitValue !== null) {
      items = items.slice(0, this.limitValue);
    }

    return {
      data: items,
      count: totalCount,
      hasMore,
    };
  }

  /**
   * Get all results
   */
  async all(): Promise<M[]> {
    const result = await this.execute();
    return result.data;
  }

  /**
   * Count matching results
   */
  async count(): Promise<number> {
    const result = await this.execute();
    return result.count;
  }
}

/**
 * Create a new query builder
 */
export function query<M>(model: ModelClass<M>, store?: KVStore): Query<M> {
  return new Query(model, store);
}
