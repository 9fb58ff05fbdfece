/**
 * LocalDataSource
 *
 * Generic SQLite data source for the catalog cache.
 * Each entity repository creates an instance with the appropriate table configuration.
 */

import type { SqlParam, SqlRow, Store } from '@/lib/database';
import type { CacheQueryOptions, CacheRow, CacheTableName, OrderTerm } from '../types';
import { BatchWriteError, type CacheFilters, type TableConfig } from './types';

export class LocalDataSource<TRow extends CacheRow, TFilter extends string = never> {
  constructor(
    private readonly store: Store,
    private readonly config: TableConfig<TRow, TFilter>
  ) {}

  get tableName(): CacheTableName {
    return this.config.tableName;
  }

  async getById(id: number): Promise<TRow | null> {
    const results = await this.store.select(`SELECT * FROM ${this.config.tableName} WHERE id = $1`, [id]);
    return results.length > 0 ? this.decode(results[0]) : null;
  }

  async getAll(options: CacheQueryOptions = {}): Promise<TRow[]> {
    return this.query({}, options);
  }

  /**
   * Query rows by parent-id filters, in the table's default order.
   */
  async query(filters: CacheFilters<TFilter>, options: CacheQueryOptions = {}): Promise<TRow[]> {
    const { clauses, params } = this.whereClauses(filters, options, '');
    const whereClause = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    const results = await this.store.select(
      `SELECT * FROM ${this.config.tableName} ${whereClause} ORDER BY ${this.orderClause('', options.sort)}`,
      params
    );
    return results.map(row => this.decode(row));
  }

  /**
   * Insert or replace a single row.
   */
  async upsert(row: TRow): Promise<void> {
    await this.store.execute(this.upsertStatement(), this.values(row));
  }

  /**
   * Insert or replace rows in chunks, one transaction per chunk. Chunks are
   * committed and flushed in order; on failure the rows of earlier chunks
   * stay written and a BatchWriteError reports how many.
   */
  async upsertMany(rows: TRow[], chunkSize: number): Promise<number> {
    const statement = this.upsertStatement();
    let written = 0;

    for (let start = 0; start < rows.length; start += chunkSize) {
      const chunk = rows.slice(start, start + chunkSize);
      try {
        await this.store.transaction(tx => {
          for (const row of chunk) {
            tx.execute(statement, this.values(row));
          }
        });
      } catch (error) {
        throw new BatchWriteError(written, error);
      }
      written += chunk.length;
      console.debug(`[Cache] ${this.config.tableName}: ${written}/${rows.length} rows written`);
    }

    return written;
  }

  async count(options: CacheQueryOptions = {}): Promise<number> {
    const whereClause = options.includeInactive ? '' : 'WHERE is_active = 1';
    const [row] = await this.store.select(`SELECT COUNT(*) AS count FROM ${this.config.tableName} ${whereClause}`);
    return typeof row?.count === 'number' ? row.count : 0;
  }

  async deleteAll(): Promise<number> {
    const { rowsAffected } = await this.store.execute(`DELETE FROM ${this.config.tableName}`);
    return rowsAffected;
  }

  // ============ Additional Utility Methods ============

  /**
   * Execute a custom query returning rows of this table.
   */
  async customQuery(sql: string, params: SqlParam[] = []): Promise<TRow[]> {
    const results = await this.store.select(sql, params);
    return results.map(row => this.decode(row));
  }

  /**
   * WHERE clauses for filters, active flag and search, prefixed with a table alias.
   */
  whereClauses(
    filters: CacheFilters<TFilter>,
    options: CacheQueryOptions,
    alias: string,
    firstParam = 1
  ): { clauses: string[]; params: SqlParam[] } {
    const prefix = alias ? `${alias}.` : '';
    const clauses: string[] = [];
    const params: SqlParam[] = [];

    for (const column of this.config.filterColumns) {
      const value = filters[column];
      if (value === undefined || value === null) continue;
      params.push(value);
      clauses.push(`${prefix}${column} = $${firstParam + params.length - 1}`);
    }

    if (!options.includeInactive) {
      clauses.push(`${prefix}is_active = 1`);
    }

    const search = options.search?.trim();
    if (search && this.config.searchColumns.length > 0) {
      // % and _ in the query match themselves
      const needle = search.toLowerCase().replace(/[\\%_]/g, char => `\\${char}`);
      params.push(`%${needle}%`);
      const placeholder = `$${firstParam + params.length - 1}`;
      const matches = this.config.searchColumns.map(
        column => `LOWER(${prefix}${column}) LIKE ${placeholder} ESCAPE '\\'`
      );
      clauses.push(`(${matches.join(' OR ')})`);
    }

    return { clauses, params };
  }

  orderClause(alias: string, sort?: readonly OrderTerm[]): string {
    const prefix = alias ? `${alias}.` : '';
    const known: readonly string[] = this.config.columns;
    const requested = (sort ?? []).filter(([column]) => known.includes(column));
    const terms = requested.length > 0 ? requested : this.config.orderBy;
    return terms.map(([column, direction]) => `${prefix}${column} ${direction === 'DESC' ? 'DESC' : 'ASC'}`).join(', ');
  }

  private upsertStatement(): string {
    const placeholders = this.config.columns.map((_, i) => `$${i + 1}`).join(', ');
    return `INSERT OR REPLACE INTO ${this.config.tableName} (${this.config.columns.join(', ')}) VALUES (${placeholders})`;
  }

  private values(row: TRow): SqlParam[] {
    const record: Record<string, SqlParam> = row;
    return this.config.columns.map(column => record[column] ?? null);
  }

  private decode(row: SqlRow): TRow {
    return this.config.rowSchema.parse(row);
  }
}
