/**
 * Migration Runner for the Local Store
 *
 * Migrations are numbered and strictly additive (new tables, columns and
 * indexes). Applied versions are tracked in the _migrations table; each step
 * runs in its own transaction so a failed step leaves the previous version
 * intact.
 */

import type { Store } from './database';

export interface Migration {
  version: number;
  name: string;
  statements: string[];
}

export interface MigrationResult {
  applied: string[];
  version: number;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: '00001_downloaded_assets',
    statements: [
      `CREATE TABLE IF NOT EXISTS downloaded_assets (
        lesson_id INTEGER PRIMARY KEY,
        file_path TEXT NOT NULL,
        file_size INTEGER NOT NULL DEFAULT 0,
        download_date TEXT NOT NULL,
        status TEXT NOT NULL
      )`,
    ],
  },
  {
    version: 2,
    name: '00002_catalog_cache',
    statements: [
      'ALTER TABLE downloaded_assets ADD COLUMN series_id INTEGER',
      'ALTER TABLE downloaded_assets ADD COLUMN lesson_data TEXT',
      `CREATE TABLE IF NOT EXISTS themes (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        sort_order INTEGER NOT NULL DEFAULT 0,
        is_active INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS book_authors (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        biography TEXT,
        birth_year INTEGER,
        death_year INTEGER,
        is_active INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS books (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        theme_id INTEGER,
        author_id INTEGER,
        sort_order INTEGER NOT NULL DEFAULT 0,
        is_active INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS teachers (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        biography TEXT,
        is_active INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS series (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        display_name TEXT,
        description TEXT,
        year INTEGER,
        is_completed INTEGER NOT NULL DEFAULT 0,
        teacher_id INTEGER,
        book_id INTEGER,
        theme_id INTEGER,
        series_order INTEGER NOT NULL DEFAULT 0,
        is_active INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS idx_downloaded_assets_series ON downloaded_assets(series_id)',
      'CREATE INDEX IF NOT EXISTS idx_books_theme ON books(theme_id)',
      'CREATE INDEX IF NOT EXISTS idx_books_author ON books(author_id)',
      'CREATE INDEX IF NOT EXISTS idx_series_theme ON series(theme_id)',
      'CREATE INDEX IF NOT EXISTS idx_series_book ON series(book_id)',
      'CREATE INDEX IF NOT EXISTS idx_series_teacher ON series(teacher_id)',
    ],
  },
  {
    version: 3,
    name: '00003_lessons_cache',
    statements: [
      `CREATE TABLE IF NOT EXISTS lessons (
        id INTEGER PRIMARY KEY,
        title TEXT,
        display_title TEXT,
        lesson_number INTEGER NOT NULL DEFAULT 0,
        duration_seconds INTEGER,
        formatted_duration TEXT,
        audio_url TEXT,
        audio_file_path TEXT,
        description TEXT,
        tags TEXT,
        waveform_data TEXT,
        series_id INTEGER,
        teacher_id INTEGER,
        book_id INTEGER,
        theme_id INTEGER,
        is_active INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS idx_lessons_series ON lessons(series_id)',
      'CREATE INDEX IF NOT EXISTS idx_lessons_book ON lessons(book_id)',
      'CREATE INDEX IF NOT EXISTS idx_lessons_teacher ON lessons(teacher_id)',
      'CREATE INDEX IF NOT EXISTS idx_lessons_theme ON lessons(theme_id)',
    ],
  },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

async function ensureMigrationsTable(store: Store): Promise<void> {
  await store.execute(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);
}

async function getAppliedVersions(store: Store): Promise<Set<number>> {
  const rows = await store.select('SELECT version FROM _migrations ORDER BY version');
  const versions = new Set<number>();
  for (const row of rows) {
    if (typeof row.version === 'number') versions.add(row.version);
  }
  return versions;
}

/**
 * Bring the store up to `targetVersion`. Steps already applied are skipped;
 * a target below the applied version leaves the schema as it is.
 * Any failure is thrown: the store cannot be used on a half-known schema.
 */
export async function runMigrations(store: Store, targetVersion: number): Promise<MigrationResult> {
  await ensureMigrationsTable(store);
  const appliedVersions = await getAppliedVersions(store);
  const applied: string[] = [];

  for (const migration of MIGRATIONS) {
    if (migration.version > targetVersion || appliedVersions.has(migration.version)) {
      continue;
    }

    console.log(`[Migrations] Applying ${migration.name}...`);
    try {
      await store.transaction(tx => {
        for (const statement of migration.statements) {
          tx.execute(statement);
        }
        tx.execute('INSERT INTO _migrations (version, name, applied_at) VALUES ($1, $2, $3)', [
          migration.version,
          migration.name,
          new Date().toISOString(),
        ]);
      });
    } catch (error) {
      console.error(`[Migrations] Failed to apply ${migration.name}:`, error);
      throw error;
    }
    appliedVersions.add(migration.version);
    applied.push(migration.name);
  }

  return { applied, version: Math.max(0, ...appliedVersions) };
}
