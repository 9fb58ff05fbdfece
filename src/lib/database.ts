/**
 * Local Store
 *
 * SQLite via sql.js (SQLite compiled to WASM), persisted to a single file on
 * disk after every committed write. Exposes the same select/execute surface
 * the repositories use, plus transactions.
 *
 * Writes are serialised through a promise chain; each write section commits
 * and flushes before the next one starts. Reads run against the live
 * in-memory database and never wait for a write section.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic, type SqlValue } from 'sql.js';
import { MEMORY_DATABASE } from './config';
import { LATEST_SCHEMA_VERSION, runMigrations } from './migrations';

export type SqlParam = SqlValue;
export type SqlRow = Record<string, SqlValue>;

export interface StoreOptions {
  /** File path of the database, or `:memory:` for a store that never touches disk. */
  path: string;
  /** Schema version to migrate to. Defaults to the latest. */
  targetVersion?: number;
}

/**
 * Synchronous handle passed to transaction bodies. sql.js runs statements
 * synchronously, so a transaction body cannot interleave with other work.
 */
export interface StoreTransaction {
  select(query: string, params?: SqlParam[]): SqlRow[];
  execute(query: string, params?: SqlParam[]): { rowsAffected: number };
}

export class StoreOpenError extends Error {
  constructor(
    readonly path: string,
    readonly cause: unknown
  ) {
    super(`Failed to open local store at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'StoreOpenError';
  }
}

export class StoreClosedError extends Error {
  constructor(readonly path: string) {
    super(`Local store at ${path} is closed`);
    this.name = 'StoreClosedError';
  }
}

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs().catch(error => {
      sqlJsPromise = null;
      throw error;
    });
  }
  return sqlJsPromise;
}

// Live handles by file path. In-memory stores are never shared.
const openStores = new Map<string, Promise<Store>>();

/**
 * Convert PostgreSQL-style parameters ($1, $2) to SQLite-style (?)
 * and reorder params array accordingly.
 */
function convertParams(query: string, params: SqlParam[]): { query: string; params: SqlParam[] } {
  const paramRefs: number[] = [];
  const regex = /\$(\d+)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(query)) !== null) {
    paramRefs.push(parseInt(match[1], 10));
  }

  if (paramRefs.length === 0) {
    return { query, params };
  }

  return {
    query: query.replace(/\$\d+/g, '?'),
    params: paramRefs.map(paramNum => params[paramNum - 1] ?? null),
  };
}

function selectRows(db: SqlJsDatabase, query: string, params: SqlParam[]): SqlRow[] {
  const converted = convertParams(query, params);
  const statement = db.prepare(converted.query);
  try {
    statement.bind(converted.params);
    const rows: SqlRow[] = [];
    while (statement.step()) {
      rows.push(statement.getAsObject());
    }
    return rows;
  } finally {
    statement.free();
  }
}

function executeStatement(db: SqlJsDatabase, query: string, params: SqlParam[]): { rowsAffected: number } {
  const converted = convertParams(query, params);
  db.run(converted.query, converted.params);
  return { rowsAffected: db.getRowsModified() };
}

export class Store {
  private writeChain: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    readonly path: string
  ) {}

  /**
   * Open (or reuse) the store at `options.path` and migrate it.
   * Repeated opens of the same file path return the same live handle.
   */
  static open(options: StoreOptions): Promise<Store> {
    if (options.path !== MEMORY_DATABASE) {
      const existing = openStores.get(options.path);
      if (existing) return existing;
    }

    const opening = Store.create(options);
    if (options.path !== MEMORY_DATABASE) {
      openStores.set(options.path, opening);
      opening.catch(() => openStores.delete(options.path));
    }
    return opening;
  }

  private static async create(options: StoreOptions): Promise<Store> {
    const targetVersion = options.targetVersion ?? LATEST_SCHEMA_VERSION;
    try {
      const SQL = await loadSqlJs();
      const existingData = options.path === MEMORY_DATABASE ? null : await readExisting(options.path);
      const store = new Store(existingData ? new SQL.Database(existingData) : new SQL.Database(), options.path);

      const result = await runMigrations(store, targetVersion);
      console.log(
        `[Store] Opened ${options.path} at schema v${result.version}` +
          (result.applied.length > 0 ? ` (applied ${result.applied.join(', ')})` : '')
      );
      return store;
    } catch (error) {
      console.error('[Store] Failed to open', options.path, error);
      throw new StoreOpenError(options.path, error);
    }
  }

  get isMemory(): boolean {
    return this.path === MEMORY_DATABASE;
  }

  /**
   * Select records from the database.
   */
  async select(query: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    this.assertOpen();
    return selectRows(this.db, query, params);
  }

  /**
   * Execute a single statement in its own write section.
   */
  execute(query: string, params: SqlParam[] = []): Promise<{ rowsAffected: number }> {
    return this.transaction(tx => tx.execute(query, params));
  }

  /**
   * Run `work` inside BEGIN/COMMIT, rolling back if it throws, then flush the
   * committed state to disk. Write sections run one at a time in call order.
   */
  transaction<T>(work: (tx: StoreTransaction) => T): Promise<T> {
    return this.exclusive(async () => {
      this.assertOpen();
      const tx: StoreTransaction = {
        select: (query, params = []) => selectRows(this.db, query, params),
        execute: (query, params = []) => executeStatement(this.db, query, params),
      };

      this.db.run('BEGIN');
      let result: T;
      try {
        result = work(tx);
        this.db.run('COMMIT');
      } catch (error) {
        this.db.run('ROLLBACK');
        throw error;
      }

      await this.persist();
      return result;
    });
  }

  /**
   * Highest applied migration version, 0 for an empty database.
   */
  async schemaVersion(): Promise<number> {
    const rows = await this.select(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_migrations'"
    );
    if (rows.length === 0) return 0;

    const [row] = await this.select('SELECT MAX(version) AS version FROM _migrations');
    return typeof row?.version === 'number' ? row.version : 0;
  }

  /**
   * Flush pending writes, persist, and release the handle.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.writeChain;
    await this.persist();
    this.closed = true;
    this.db.close();
    if (!this.isMemory) {
      openStores.delete(this.path);
    }
    console.log('[Store] Closed', this.path);
  }

  private exclusive<T>(section: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(section);
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async persist(): Promise<void> {
    if (this.isMemory) return;

    const data = this.db.export();
    const tempPath = `${this.path}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tempPath, data);
    await rename(tempPath, this.path);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreClosedError(this.path);
    }
  }
}

async function readExisting(path: string): Promise<Uint8Array | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (isMissingFile(error)) {
      // A temp file without its target means a flush was interrupted before rename.
      await rm(`${path}.tmp`, { force: true });
      return null;
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
