/**
 * CacheRepository
 *
 * Abstract base class for catalog cache repositories:
 * - The sync orchestrator writes remote entities here (single or chunked batches)
 * - Collection providers read from here when the server is unreachable
 * - Rows are decoded once at this boundary; failures come back as results, not exceptions
 */

import { errorMessage } from '@/api/errors';
import type { Store } from '@/lib/database';
import { LocalDataSource } from '../datasources/LocalDataSource';
import { BatchWriteError, type CacheFilters, type TableConfig } from '../datasources/types';
import {
  DOWNLOADS_TABLE,
  type BatchWriteResult,
  type CacheQueryOptions,
  type CacheResult,
  type CacheRow,
  type CacheTableName,
} from '../types';

export abstract class CacheRepository<
  TEntity extends { id: number },
  TRow extends CacheRow,
  TFilter extends string = never,
> {
  protected readonly localDataSource: LocalDataSource<TRow, TFilter>;

  /**
   * Joins from the table (aliased `p`) down to `downloaded_assets d`.
   */
  protected abstract readonly downloadsJoin: string;

  constructor(
    protected readonly store: Store,
    config: TableConfig<TRow, TFilter>,
    protected readonly chunkSize: number
  ) {
    this.localDataSource = new LocalDataSource(store, config);
  }

  get tableName(): CacheTableName {
    return this.localDataSource.tableName;
  }

  /**
   * Convert a remote entity into a row stamped with `updatedAt`.
   */
  abstract toRow(entity: TEntity, updatedAt: string): TRow;

  /**
   * Convert a cached row back into the entity the UI consumes.
   */
  abstract fromRow(row: TRow): TEntity;

  // ============ Write Operations ============

  /**
   * Insert or replace one entity. Last write wins.
   */
  async upsertOne(entity: TEntity): Promise<BatchWriteResult> {
    try {
      await this.localDataSource.upsert(this.toRow(entity, new Date().toISOString()));
      return { written: 1, error: null };
    } catch (error) {
      console.error(`[Cache] Failed to write ${this.tableName} ${entity.id}:`, error);
      return { written: 0, error: errorMessage(error) };
    }
  }

  /**
   * Insert or replace entities in chunks, each chunk committed on its own.
   * A failure stops the batch; `written` counts rows of committed chunks.
   */
  async upsertBatch(entities: TEntity[]): Promise<BatchWriteResult> {
    if (entities.length === 0) return { written: 0, error: null };

    const updatedAt = new Date().toISOString();
    const rows = entities.map(entity => this.toRow(entity, updatedAt));

    try {
      const written = await this.localDataSource.upsertMany(rows, this.chunkSize);
      return { written, error: null };
    } catch (error) {
      const written = error instanceof BatchWriteError ? error.written : 0;
      const cause = error instanceof BatchWriteError ? error.cause : error;
      console.error(`[Cache] Batch write to ${this.tableName} stopped after ${written} rows:`, cause);
      return { written, error: errorMessage(cause) };
    }
  }

  // ============ Read Operations ============

  /**
   * Cached rows matching the filters in the table's default order.
   */
  async queryAll(filters: CacheFilters<TFilter> = {}, options: CacheQueryOptions = {}): Promise<CacheResult<TRow>> {
    try {
      return { items: await this.localDataSource.query(filters, options), error: null };
    } catch (error) {
      console.error(`[Cache] Failed to read ${this.tableName}:`, error);
      return { items: [], error: errorMessage(error) };
    }
  }

  /**
   * Cached rows with at least one active descendant whose lesson download
   * completed. Lets an offline user browse only what they actually have.
   */
  async queryWithActiveDescendant(
    filters: CacheFilters<TFilter> = {},
    options: CacheQueryOptions = {}
  ): Promise<CacheResult<TRow>> {
    const { clauses, params } = this.localDataSource.whereClauses(filters, options, 'p', 2);
    const sql = `
      SELECT DISTINCT p.* FROM ${this.tableName} p
      ${this.downloadsJoin}
      WHERE ${['d.status = $1', ...clauses].join(' AND ')}
      ORDER BY ${this.localDataSource.orderClause('p', options.sort)}
    `;

    try {
      return { items: await this.localDataSource.customQuery(sql, ['completed', ...params]), error: null };
    } catch (error) {
      console.error(`[Cache] Failed to read downloaded ${this.tableName}:`, error);
      return { items: [], error: errorMessage(error) };
    }
  }

  async getById(id: number): Promise<TRow | null> {
    try {
      return await this.localDataSource.getById(id);
    } catch (error) {
      console.error(`[Cache] Failed to read ${this.tableName} ${id}:`, error);
      return null;
    }
  }

  async count(options: CacheQueryOptions = {}): Promise<number> {
    try {
      return await this.localDataSource.count(options);
    } catch (error) {
      console.error(`[Cache] Failed to count ${this.tableName}:`, error);
      return 0;
    }
  }

  toEntities(rows: TRow[]): TEntity[] {
    return rows.map(row => this.fromRow(row));
  }
}

/**
 * Join fragment through series to their completed downloads.
 */
export function seriesDownloadsJoin(seriesColumn: 'theme_id' | 'book_id' | 'teacher_id', parent = 'p'): string {
  return `
    INNER JOIN series s ON s.${seriesColumn} = ${parent}.id AND s.is_active = 1
    INNER JOIN ${DOWNLOADS_TABLE} d ON d.series_id = s.id
  `;
}
