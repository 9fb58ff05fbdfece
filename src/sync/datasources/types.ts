/**
 * DataSource Types
 *
 * Table configuration and query shapes shared by the cache data sources.
 */

import type { z } from 'zod';
import type { CacheRow, CacheTableName, OrderTerm } from '../types';

/**
 * Equality filters on parent-id columns. Absent and null entries are ignored.
 */
export type CacheFilters<TFilter extends string> = Partial<Record<TFilter, number | null>>;

/**
 * Table configuration for a cache data source.
 */
export interface TableConfig<TRow extends CacheRow, TFilter extends string> {
  tableName: CacheTableName;

  /**
   * Columns written on upsert, in order.
   */
  columns: readonly (keyof TRow & string)[];

  /**
   * Decodes a raw SQLite row. Rows failing validation surface as read errors.
   */
  rowSchema: z.ZodType<TRow, z.ZodTypeDef, unknown>;

  /**
   * Default ordering of list reads.
   */
  orderBy: readonly OrderTerm[];

  /**
   * Parent-id columns accepted as filters.
   */
  filterColumns: readonly TFilter[];

  /**
   * Text columns matched by a case-insensitive substring search.
   */
  searchColumns: readonly (keyof TRow & string)[];
}

export class BatchWriteError extends Error {
  constructor(
    readonly written: number,
    readonly cause: unknown
  ) {
    super(cause instanceof Error ? cause.message : String(cause));
    this.name = 'BatchWriteError';
  }
}
